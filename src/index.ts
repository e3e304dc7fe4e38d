export * from "./errors/extractor/ExtractorErrorTypes";
export * from "./types/documentTypes";
export { ContentExtractor } from "./classes/ContentExtractor";
export { createApp } from "./app";
export {
  extractFromHtml,
  extractPage,
  extractPageFromHtml,
  extractVisibleText,
} from "./utils/extractVisibleText";
export { fetchPage } from "./utils/fetchPage";
export type { FetchOptions } from "./utils/fetchPage";
