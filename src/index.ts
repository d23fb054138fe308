export * from "./common/index.js";
export * from "./parser/blob-unpacker.js";
export * from "./parser/object-walker.js";
export * from "./builder/blob-packer.js";
export * from "./framing/index.js";
export * from "./commands/index.js";
export * from "./session/index.js";
export * from "./config.js";
