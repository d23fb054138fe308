export * from "./json-commands.js";
export * from "./rma-token.js";
export * from "./schemas.js";
