import { Command, InvalidArgumentError } from "commander";
import { EXTRACTOR_CONFIG } from "../config/extractorConfig";
import { countTokens } from "../utils/countTokens";
import { extractVisibleText } from "../utils/extractVisibleText";
import { writeStderr, writeStdout } from "../utils/terminal";
import { writeOutput } from "../utils/writeOutput";

export interface ExtractCommandOptions {
  output?: string;
  timeout: number;
  tokens?: boolean;
}

export function parseTimeoutOption(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds.");
  }
  return seconds;
}

export function extractCommand(): Command {
  return new Command("visible-text")
    .description("Extract visible text with layout annotations from a web page")
    .argument("<url>", "Web page URL to fetch")
    .option("-o, --output <file>", "Write result to FILE instead of stdout")
    .option(
      "-t, --timeout <seconds>",
      "HTTP timeout in seconds",
      parseTimeoutOption,
      EXTRACTOR_CONFIG.timeoutSeconds
    )
    .option("--tokens", "Report the token count of the result on stderr")
    .action(async (url: string, options: ExtractCommandOptions) => {
      const text = await extractVisibleText(url, options.timeout);

      if (options.output) {
        const written = await writeOutput(options.output, text);
        writeStderr(`✔ Saved to ${written}`);
      } else {
        writeStdout(text);
      }

      if (options.tokens) {
        writeStderr(`Tokens: ${countTokens(text)}`);
      }
    });
}
