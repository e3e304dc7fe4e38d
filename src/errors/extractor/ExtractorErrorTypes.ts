export class ExtractorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EXTRACTOR_ERROR";
  }
}

export class InvalidUrlError extends ExtractorError {
  readonly url: string;

  constructor(url: string) {
    super(`INVALID_URL: ${url}`);
    this.name = "INVALID_URL_ERROR";
    this.url = url;
  }
}

export class NetworkError extends ExtractorError {
  readonly url: string;
  readonly code: string | null;

  constructor(url: string, detail: string, code: string | null = null) {
    super(`NETWORK_FAILURE: ${url} (${detail})`);
    this.name = "NETWORK_ERROR";
    this.url = url;
    this.code = code;
  }

  get isTimeout(): boolean {
    return this.code === "ECONNABORTED" || this.code === "ETIMEDOUT";
  }
}

export class HTTPStatusError extends ExtractorError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number, statusText = "") {
    super(`HTTP_STATUS_${status}: ${url}${statusText ? ` (${statusText})` : ""}`);
    this.name = "HTTP_STATUS_ERROR";
    this.url = url;
    this.status = status;
  }
}

export class OutputWriteError extends ExtractorError {
  readonly path: string;
  readonly originalError: unknown;

  constructor(path: string, originalError: unknown) {
    super(
      `OUTPUT_NOT_WRITABLE: ${path} (${
        originalError instanceof Error ? originalError.message : String(originalError)
      })`
    );
    this.name = "OUTPUT_WRITE_ERROR";
    this.path = path;
    this.originalError = originalError;
  }
}
