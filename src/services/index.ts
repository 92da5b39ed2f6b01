export * from "./browser"
export * from "./config"
export * from "./exporter"
export * from "./extractor"
export * from "./fetcher"
export * from "./inference"
export * from "./parsing"
export * from "./pipeline"
export * from "./walker"
