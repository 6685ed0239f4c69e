/**
 * Record parser module exports
 */

export type { LogRecord, RecordParser } from "./base.js"
export { decodeHexTimestamp, Vc0RecordParser } from "./vc0.js"
