export type * from "./ModelPort.js";
export type * from "./SearchPort.js";
export type * from "./LogStorePort.js";
