export * from "./allocation";
export * from "./ast";
export * from "./context";
export * from "./decimal";
export * from "./dispatcher";
export * from "./engine";
export * from "./errors";
export * from "./evaluator";
export * from "./events";
export * from "./format";
export * from "./fragment";
export * from "./indicatorGateway";
export * from "./lexer";
export * from "./operators";
export * from "./parser";
export * from "./trace";
export * from "./values";
