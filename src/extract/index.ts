export * from "./extractor";
export * from "./links";
export * from "./profiles";
