const utf8Decoder = new TextDecoder("utf-8");

export function charsetOf(contentType: unknown): string | undefined {
  if (typeof contentType !== "string") return undefined;
  return /charset\s*=\s*"?([^";\s]+)/i.exec(contentType)?.[1]?.toLowerCase();
}

/** Decodes a response body with its declared charset; UTF-8 when absent or unknown. */
export function decodeBody(body: ArrayBuffer | Uint8Array, charset?: string): string {
  if (!charset || charset === "utf-8" || charset === "utf8") {
    return utf8Decoder.decode(body);
  }

  try {
    return new TextDecoder(charset).decode(body);
  } catch {
    return utf8Decoder.decode(body);
  }
}
