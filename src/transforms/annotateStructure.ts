import { DocNode, ElementNode, HeadingLevel } from "../types/documentTypes";
import { innerText, textNode, transformTree } from "./docTree";

/** Returns the literal token for a matched element, or null to leave it alone. */
export type TokenRule = (element: ElementNode) => string | null;

export type AnnotationPass = (root: DocNode) => DocNode;

const HEADING_TAGS: ReadonlyMap<string, HeadingLevel> = new Map<string, HeadingLevel>([
  ["h1", 1],
  ["h2", 2],
  ["h3", 3],
  ["h4", 4],
]);

export const headingToken = (level: HeadingLevel, text: string) => `\n\n**[H${level}] ${text}**\n\n`;
export const bulletToken = (text: string) => `- ${text}\n`;
export const anchorToken = (text: string) => `#${text}`;
export const paragraphToken = (text: string) => `${text}\n\n`;
export const LINE_BREAK_TOKEN = "\n";

/**
 * Builds a pass that swaps every matched element for a text node. The
 * outermost match wins; anything nested inside it only contributes text.
 */
export function replaceElements(rule: TokenRule): AnnotationPass {
  return (root) =>
    transformTree(root, (element) => {
      const token = rule(element);
      return token === null ? undefined : textNode(token);
    }) ?? root;
}

export const annotateHeadings = replaceElements((element) => {
  const level = HEADING_TAGS.get(element.tag);
  return level ? headingToken(level, innerText(element)) : null;
});

export const annotateListItems = replaceElements((element) =>
  element.tag === "li" ? bulletToken(innerText(element)) : null
);

export const annotateAnchors = replaceElements((element) =>
  element.tag === "a" ? anchorToken(innerText(element)) : null
);

export const annotateParagraphs = replaceElements((element) =>
  element.tag === "p" ? paragraphToken(innerText(element)) : null
);

export const annotateLineBreaks = replaceElements((element) =>
  element.tag === "br" ? LINE_BREAK_TOKEN : null
);

// Order matters: later passes fold the committed output of earlier ones.
export const ANNOTATION_PASSES: readonly AnnotationPass[] = [
  annotateHeadings,
  annotateListItems,
  annotateAnchors,
  annotateParagraphs,
  annotateLineBreaks,
];

export function annotateStructure(root: DocNode): DocNode {
  return ANNOTATION_PASSES.reduce((tree, pass) => pass(tree), root);
}
