export * from "./types/replay";
export { canonicalEncode, hashValue, chainHash } from "./libs/Crypto";
export { createLogger } from "./logger";
export type { Logger } from "./logger";

// Replay persistence
export * from "./database";
