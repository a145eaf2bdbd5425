export * from "./config";
export * from "./pipeline/index";
export * from "./state/index";
