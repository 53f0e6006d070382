export * from "./ChunkTextTool";
export * from "./codeTitle";
export * from "./errors";
export * from "./ExtractCodeBlocksTool";
export * from "./PrepareDocumentTool";
