import {
  annotateStructure,
  collectText,
  filterInvisible,
  normalizeWhitespace,
  selectScope,
} from "../transforms";
import { BaseExtractor } from ".";

export class BodyTextExtractor extends BaseExtractor<string> {
  extract(): string {
    const { scope } = selectScope(this.$);

    const visible = filterInvisible(scope);
    const annotated = annotateStructure(visible);

    return normalizeWhitespace(collectText(annotated));
  }
}
