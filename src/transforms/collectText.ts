import { DocNode } from "../types/documentTypes";
import { textFragments } from "./docTree";

// Single-space joiner: inline elements must not split a line. Every intended
// newline is already a literal "\n" in the annotated tree.
export const collectText = (root: DocNode): string => textFragments(root).join(" ");
