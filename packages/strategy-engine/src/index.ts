export * from "./errors";
export * from "./strategyEngine";
