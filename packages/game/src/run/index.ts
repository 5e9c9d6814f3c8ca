export * from "./game-run";
export * from "./outcome";
export * from "./views";
