import { isRemovedTag } from "../constants/visibilityRules";
import { DocNode } from "../types/documentTypes";
import { DOCUMENT_TAG, elementNode, transformTree } from "./docTree";

/**
 * Drops non-rendered elements and header/footer chrome, subtree included, at
 * any depth below the scope root. Must run before any text is read.
 */
export function filterInvisible(root: DocNode): DocNode {
  const visible = transformTree(root, (element) => (isRemovedTag(element.tag) ? null : undefined));
  return visible ?? elementNode(DOCUMENT_TAG);
}
