// Never rendered, or rendered without readable text.
export const INVISIBLE_TAGS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "noscript",
  "img",
  "svg",
  "iframe",
  "head",
  "title",
]);

// Page chrome, dropped wherever it appears.
export const BOILERPLATE_TAGS: ReadonlySet<string> = new Set(["header", "footer"]);

export const isRemovedTag = (tag: string): boolean =>
  INVISIBLE_TAGS.has(tag) || BOILERPLATE_TAGS.has(tag);
