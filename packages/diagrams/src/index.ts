export * from "./deck.js";
export * from "./degraded.js";
export * from "./placeholder.js";
export * from "./renderer.js";
export * from "./resolver.js";
export * from "./syntax.js";
