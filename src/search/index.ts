export * from "./bm25";
export * from "./chunks";
export * from "./indexer";
export * from "./lexicalIndex";
export * from "./retriever";
export * from "./tokenize";
