import { PageMetadata } from "../types/documentTypes";

export function buildHeader({ urlPath, title, description }: PageMetadata): string {
  const lines: string[] = [];

  if (urlPath) lines.push(`#URL_PATH: ${urlPath}`);
  if (title) lines.push(`#TITLE: ${title}`);
  if (description) lines.push(`#META_DESC: ${description}`);

  return lines.join("\n");
}

export const composeDocument = (header: string, body: string): string => `${header}\n\n${body}`;
