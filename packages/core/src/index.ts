export * from "./types/title";
export * from "./types/pipeline";
export * from "./types/report";
export * from "./constants/fields";
export * from "./utils/text";
export * from "./utils/date";
