export * from "./contentStore";
export * from "./downloader";
