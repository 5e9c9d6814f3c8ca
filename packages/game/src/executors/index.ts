export * from "./inline-executor";
export * from "./types";
export * from "./worker-executor";
