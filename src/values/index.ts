export * from "./candidates";
export * from "./fill";
export * from "./indicators";
export * from "./numbers";
export * from "./queryBuilder";
export * from "./resolver";
export * from "./valueModel";
