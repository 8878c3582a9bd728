export type * from "./types/api.js";
export type * from "./types/chat.js";
export type * from "./types/graph.js";
export type * from "./types/image.js";
export type * from "./types/knowledge.js";
export type * from "./store.js";
