export * from "./interfaces";
export * from "./errors";
export * from "./redact";
export * from "./node";
export * from "./paths";
