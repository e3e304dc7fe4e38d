import { CheerioAPI } from "cheerio";
import { AnyNode } from "domhandler";
import { DocNode } from "../types/documentTypes";
import { DOCUMENT_TAG, elementNode, toDocTree } from "./docTree";

export interface ScopeSelection {
  /** Independent copy of the narrowed subtree; safe to transform. */
  scope: DocNode;
  /** The full parsed document, only ever queried. */
  metadataSource: CheerioAPI;
}

function scopeRootOf($: CheerioAPI): AnyNode | undefined {
  return $("main").get(0) ?? $("body").get(0) ?? $.root().get(0);
}

export function selectScope($: CheerioAPI): ScopeSelection {
  const root = scopeRootOf($);
  const scope = (root && toDocTree(root)) || elementNode(DOCUMENT_TAG);

  return { scope, metadataSource: $ };
}
