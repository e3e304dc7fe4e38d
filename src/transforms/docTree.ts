import { AnyNode, isDocument, isTag, isText } from "domhandler";
import { DocNode, ElementNode, TextNode } from "../types/documentTypes";

export const DOCUMENT_TAG = "#document";

export const textNode = (text: string): TextNode => ({ type: "text", text });

export const elementNode = (
  tag: string,
  children: readonly DocNode[] = [],
  attributes: Readonly<Record<string, string>> = {}
): ElementNode => ({ type: "element", tag, attributes, children });

// All walks below keep an explicit stack: nesting depth is unbounded in real markup.

interface CopyFrame {
  tag: string;
  attributes: Record<string, string>;
  source: readonly AnyNode[];
  children: DocNode[];
  index: number;
}

function openCopyFrame(node: AnyNode): CopyFrame | null {
  if (isTag(node)) {
    return {
      tag: node.name.toLowerCase(),
      attributes: { ...node.attribs },
      source: node.children,
      children: [],
      index: 0,
    };
  }

  if (isDocument(node)) {
    return { tag: DOCUMENT_TAG, attributes: {}, source: node.children, children: [], index: 0 };
  }

  return null;
}

/**
 * Deep-copies a parsed node into the immutable tree model. Comments, doctypes,
 * CDATA and processing instructions carry no visible text and are dropped.
 */
export function toDocTree(root: AnyNode): DocNode | null {
  if (isText(root)) return textNode(root.data);

  const rootFrame = openCopyFrame(root);
  if (!rootFrame) return null;

  const stack: CopyFrame[] = [rootFrame];
  let copy: ElementNode | null = null;

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.index === frame.source.length) {
      stack.pop();
      const element = elementNode(frame.tag, frame.children, frame.attributes);
      const parent = stack[stack.length - 1];
      if (parent) parent.children.push(element);
      else copy = element;
      continue;
    }

    const child = frame.source[frame.index++];
    if (isText(child)) {
      frame.children.push(textNode(child.data));
      continue;
    }

    const childFrame = openCopyFrame(child);
    if (childFrame) stack.push(childFrame);
  }

  return copy;
}

/**
 * Decides what becomes of an element: a node to put in its place, null to
 * drop it, or undefined to keep it and visit its children.
 */
export type ElementVisitor = (element: ElementNode) => DocNode | null | undefined;

interface RebuildFrame {
  source: ElementNode;
  children: DocNode[];
  index: number;
}

/** Rebuilds `root` bottom-up, consulting `visit` for every element in document order. */
export function transformTree(root: DocNode, visit: ElementVisitor): DocNode | null {
  if (root.type === "text") return root;

  const rootOutcome = visit(root);
  if (rootOutcome !== undefined) return rootOutcome;

  const stack: RebuildFrame[] = [{ source: root, children: [], index: 0 }];
  let rebuilt: DocNode | null = null;

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.index === frame.source.children.length) {
      stack.pop();
      const element: ElementNode = { ...frame.source, children: frame.children };
      const parent = stack[stack.length - 1];
      if (parent) parent.children.push(element);
      else rebuilt = element;
      continue;
    }

    const child = frame.source.children[frame.index++];
    if (child.type === "text") {
      frame.children.push(child);
      continue;
    }

    const outcome = visit(child);
    if (outcome === undefined) stack.push({ source: child, children: [], index: 0 });
    else if (outcome !== null) frame.children.push(outcome);
  }

  return rebuilt;
}

export function textFragments(root: DocNode): string[] {
  const fragments: string[] = [];
  const pending: DocNode[] = [root];

  let node: DocNode | undefined;
  while ((node = pending.pop()) !== undefined) {
    if (node.type === "text") {
      fragments.push(node.text);
      continue;
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      pending.push(node.children[i]);
    }
  }

  return fragments;
}

/**
 * Visible descendant text on a single line: each fragment trimmed, empty
 * fragments dropped, the rest joined with one space and whitespace collapsed.
 */
export function innerText(node: DocNode): string {
  return textFragments(node)
    .map((fragment) => fragment.trim())
    .filter((fragment) => fragment.length > 0)
    .join(" ")
    .replace(/\s+/g, " ");
}
