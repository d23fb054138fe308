export * from "../common/index.js";
export * from "./blob-unpacker.js";
export * from "./object-walker.js";
