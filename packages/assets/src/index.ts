export * from "./cache.js";
export * from "./fetch.js";
export * from "./images.js";
export * from "./lock.js";
export * from "./store.js";
export * from "./util.js";
