export const normalizeLine = (line: string): string => line.replace(/\s+/g, " ").trim();

export function normalizeWhitespace(text: string): string {
  return text
    .split("\n")
    .map(normalizeLine)
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
