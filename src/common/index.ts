export * from "./checksum.js";
export * from "./codecs.js";
export * from "./errors.js";
export * from "./headers.js";
export * from "./logger.js";
export * from "./types.js";
