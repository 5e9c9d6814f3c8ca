export * from "./load-graph";
export * from "./serialize";
