import { writeFile } from "fs/promises";
import path from "path";

import { OutputWriteError } from "../errors/extractor/ExtractorErrorTypes";

/** Writes UTF-8 text and returns the absolute path written. */
export async function writeOutput(file: string, text: string): Promise<string> {
  const resolved = path.resolve(file);
  try {
    await writeFile(resolved, text, "utf8");
  } catch (error) {
    throw new OutputWriteError(resolved, error);
  }
  return resolved;
}
