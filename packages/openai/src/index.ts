export * from "./client.js";
export * from "./diagrams.js";
export * from "./sentry.js";
export * from "./slides.js";
