export * from "./enums.js";
export * from "./errors.js";
export * from "./guards.js";
export * from "./logger.js";
export * from "./retry.js";
export * from "./jsonSchema.js";
export * from "./config.js";
export * from "./layouts.js";
export * from "./normalize.js";
export * from "./decode.js";
export * from "./content/columns.js";
export * from "./content/bullets.js";
export * from "./storage/keys.js";
export * from "./schemas/slideRecord.js";
export * from "./schemas/deckConfig.js";
export { hashBytesSha256, hashTextSha256 } from "./crypto/sha256.js";
