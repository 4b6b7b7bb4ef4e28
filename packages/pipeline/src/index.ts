export * from "./batch.js";
export * from "./buildDeck.js";
export * from "./cli.js";
