export * from "./engines";
export * from "./extractor";
export * from "./textExtractor";
