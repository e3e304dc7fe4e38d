import { PageMetadata } from "../types/documentTypes";
import { UrlValidator } from "../utils/UrlValidator";
import { BaseExtractor } from ".";

/** Reads header metadata from the full, unscoped document. Never mutates it. */
export class MetadataExtractor extends BaseExtractor<PageMetadata> {
  extract(url: string): PageMetadata {
    return {
      urlPath: UrlValidator.extractUrlPath(url),
      title: this.extractTitle(),
      description: this.extractDescription(),
    };
  }

  private extractTitle(): string | null {
    return this.sanitizeText(this.$("title").first().text()) || null;
  }

  private extractDescription(): string | null {
    return this.metaContent("description") ?? this.metaContent("og:description");
  }

  private metaContent(name: string): string | null {
    const content = this.$(`meta[name="${name}"]`).first().attr("content");
    return content ? this.sanitizeText(content) || null : null;
  }
}
