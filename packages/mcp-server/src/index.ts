export * from "./data/loader";
export * from "./server";
export * from "./tools/args";
export * from "./tools/report";
export * from "./tools/status";
