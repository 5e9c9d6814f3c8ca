export * from "./connectivity";
