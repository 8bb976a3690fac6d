export * from "./api/errors";
export * from "./api/timing";
