import { ContentExtractor } from "../classes/ContentExtractor";
import { EXTRACTOR_CONFIG } from "../config/extractorConfig";
import { ExtractedPage } from "../types/documentTypes";
import { fetchPage, FetchOptions } from "./fetchPage";
import { loadContentIntoCheerio } from "./loadContentIntoCheerio";

export function extractPageFromHtml(html: string, url: string): ExtractedPage {
  const $ = loadContentIntoCheerio(html);
  return new ContentExtractor($, url).extract();
}

export const extractFromHtml = (html: string, url: string): string =>
  extractPageFromHtml(html, url).text;

export async function extractPage(url: string, options: FetchOptions = {}): Promise<ExtractedPage> {
  const { html } = await fetchPage(url, options);
  return extractPageFromHtml(html, url);
}

/** Fetches `url` and returns its header block plus annotated body text. */
export async function extractVisibleText(
  url: string,
  timeoutSeconds: number = EXTRACTOR_CONFIG.timeoutSeconds
): Promise<string> {
  const page = await extractPage(url, { timeoutSeconds });
  return page.text;
}
