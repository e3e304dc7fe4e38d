import { CheerioAPI } from "cheerio";
import { BodyTextExtractor } from "../extractors/BodyTextExtractor";
import { MetadataExtractor } from "../extractors/MetadataExtractor";
import { buildHeader, composeDocument } from "../transforms";
import { ExtractedPage } from "../types/documentTypes";

// ContentExtractor.ts
export class ContentExtractor {
  private readonly url: string;
  private readonly metadataExtractor: MetadataExtractor;
  private readonly bodyTextExtractor: BodyTextExtractor;

  constructor(cheerioInstance: CheerioAPI, url: string) {
    this.url = url;
    this.metadataExtractor = new MetadataExtractor(cheerioInstance);
    this.bodyTextExtractor = new BodyTextExtractor(cheerioInstance);
  }

  extract(): ExtractedPage {
    const metadata = this.metadataExtractor.extract(this.url);
    const body = this.bodyTextExtractor.extract();
    const header = buildHeader(metadata);

    return { metadata, header, body, text: composeDocument(header, body) };
  }
}
