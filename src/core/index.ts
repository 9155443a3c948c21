export type * from "./types.js";
export type * from "./tokenizer.js";
export type * from "./aggregator.js";
export type * from "./ranker.js";
export type * from "./heap.js";
export * from "./impl/index.js";
