export * from "./aggregate";
export * from "./tokenizer";
export * from "./reports";
export * from "./registry";
