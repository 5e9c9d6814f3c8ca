export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/run-config";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
