export * from "./domain/LogAnalysis.js";
export type * from "./ports/index.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./analyzer/prompt.js";
export * from "./analyzer/invoker.js";
export * from "./analyzer/extract.js";
export * from "./analyzer/validate.js";
export * from "./analyzer/enrich.js";
export * from "./analyzer/pipeline.js";
export * from "./analyzer/createAnalyzer.js";
