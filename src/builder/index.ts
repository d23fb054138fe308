export * from "../common/index.js";
export * from "./blob-packer.js";
