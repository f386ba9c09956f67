export * from "./errors";
export * from "./span";
export * from "./diagnostics";
export * from "./lineIndex";
export * from "./tokenizer";
export * from "./multiPeek";
export * from "./lineGrouper";
export * from "./arena";
export * from "./treeBuilder";
export * from "./queryEngine";
export * from "./typeData";
export * from "./languageQueries";
export * from "./database";
export * from "./logger";
export * from "./config";
export * from "./workPool";
export * from "./dispatch";
export * from "./querySystem";
export * from "./lspConvert";
export * from "./requests";
