export * from "./types.js";
export * from "./completion.js";
export * from "./entropy.js";
export * from "./reranking.js";
export * from "./reranking-model.js";
export * from "./render.js";
export * from "./challenges.js";
