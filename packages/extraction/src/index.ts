export * from "./config";
export * from "./discord";
export * from "./fetch";
export * from "./merge";
export * from "./price";
export * from "./reduce";
export * from "./run-service";
export * from "./sizes";
export * from "./sites/pricebook";
export * from "./sites/registry";
export * from "./sites/text-price";
export * from "./store";
export * from "./types";
export type { PatternOrder } from "./sites/patterns";
export type { DiagnosticSink, ExtractorOptions, SiteExtractor } from "./sites/types";
