export * from "./perso-session.js";
export type * from "./types.js";
