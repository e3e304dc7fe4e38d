import * as cheerio from "cheerio";

// parse5 recovers from any markup, so this never throws on malformed input.
export function loadContentIntoCheerio(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}
