export * from "./sparse";
export * from "./prefetch";
export * from "./config";
export * from "./kernel";
export * from "./loader";
export * from "./provider";
