export { createMessageMap, loadMessageMap } from "./loader.js"
export type { MessageMap, MessageMapEntry } from "./types.js"
