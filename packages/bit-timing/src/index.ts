export * from "./errors";
export * from "./timing";
export * from "./select";
export * from "./batch";
export * from "./registers";
export * from "./header";
export * from "./render";
export * from "./payload";
