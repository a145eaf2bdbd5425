export * from "./stages";
export * from "./runner";
