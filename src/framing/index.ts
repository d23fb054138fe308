export * from "./frame-chunker.js";
export * from "./frame-reassembler.js";
