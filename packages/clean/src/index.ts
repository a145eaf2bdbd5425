export * from "./normalizer";
export * from "./imputer";
export * from "./dedup";
