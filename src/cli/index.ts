#!/usr/bin/env node
import { describeError, writeStderr } from "../utils/terminal";
import { extractCommand } from "./extractCommand";

const program = extractCommand().version("1.0.0");

program.parseAsync(process.argv).catch((error: unknown) => {
  writeStderr(describeError(error));
  process.exit(1);
});
