export * from "./crawler";
export * from "./htmlParser";
export * from "./pacer";
export * from "./robots";
export * from "./sitemap";
