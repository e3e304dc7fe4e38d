export * from "./annotateStructure";
export * from "./buildHeader";
export * from "./collectText";
export * from "./docTree";
export * from "./filterInvisible";
export * from "./normalizeWhitespace";
export * from "./selectScope";
