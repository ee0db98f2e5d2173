export * from "./htmlParser";
export * from "./query";
export * from "./types";
