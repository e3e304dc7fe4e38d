// types/documentTypes.ts

export interface ElementNode {
  readonly type: "element";
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly DocNode[];
}

export interface TextNode {
  readonly type: "text";
  readonly text: string;
}

export type DocNode = ElementNode | TextNode;

export type HeadingLevel = 1 | 2 | 3 | 4;

export interface PageMetadata {
  urlPath: string;
  title: string | null;
  description: string | null;
}

export interface ExtractedPage {
  metadata: PageMetadata;
  header: string;
  body: string;
  text: string;
}

export interface FetchedPage {
  url: string;
  html: string;
}
