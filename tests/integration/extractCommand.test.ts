// tests/integration/extractCommand.test.ts

import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { InvalidArgumentError } from "commander";
import nock from "nock";
import { extractCommand, parseTimeoutOption } from "../../src/cli/extractCommand";
import { HTTPStatusError, OutputWriteError } from "../../src/errors/extractor/ExtractorErrorTypes";

const EXPECTED = "#URL_PATH: /page\n#TITLE: CLI page\n\n- one\n- two";

const mockPage = () =>
  nock("https://x.test")
    .get("/page")
    .reply(200, "<title>CLI page</title><ul><li>one</li><li>two</li></ul>");

const run = (...args: string[]) =>
  extractCommand().exitOverride().parseAsync(["node", "visible-text", ...args]);

describe("visible-text command", () => {
  let workDir: string;
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    workDir = mkdtempSync(path.join(tmpdir(), "visible-text-"));
    stdout = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it("prints the extracted text to stdout", async () => {
    mockPage();

    await run("https://x.test/page");

    expect(stdout).toHaveBeenCalledWith(`${EXPECTED}\n`);
  });

  it("writes to the output file and reports it on stderr", async () => {
    mockPage();
    const target = path.join(workDir, "page.txt");

    await run("https://x.test/page", "-o", target, "--timeout", "5");

    expect(readFileSync(target, "utf8")).toBe(EXPECTED);
    expect(stderr).toHaveBeenCalledWith(`✔ Saved to ${target}\n`);
    expect(stdout).not.toHaveBeenCalled();
  });

  it("reports the token count when asked", async () => {
    mockPage();

    await run("https://x.test/page", "--tokens");

    const lines = stderr.mock.calls.map(([chunk]) => String(chunk));
    expect(lines.some((line) => /^Tokens: [1-9]\d*\n$/.test(line))).toBe(true);
  });

  it("fails on an unwritable output path", async () => {
    mockPage();
    const target = path.join(workDir, "missing-dir", "page.txt");

    await expect(run("https://x.test/page", "--output", target)).rejects.toBeInstanceOf(
      OutputWriteError
    );
  });

  it("propagates fetch failures", async () => {
    nock("https://x.test").get("/gone").reply(410);

    await expect(run("https://x.test/gone")).rejects.toBeInstanceOf(HTTPStatusError);
  });
});

describe("parseTimeoutOption", () => {
  it("accepts positive seconds", () => {
    expect(parseTimeoutOption("2.5")).toBe(2.5);
  });

  it("rejects anything else", () => {
    expect(() => parseTimeoutOption("soon")).toThrow(InvalidArgumentError);
    expect(() => parseTimeoutOption("0")).toThrow(InvalidArgumentError);
  });
});
