/**
 * Public API for the parsers module
 * Only exposes what external consumers need
 */

export { decodeHexTimestamp, type LogRecord, type RecordParser, Vc0RecordParser } from "./log-parsers/index.js"
export { type ExtractionResult, type ExtractionStats, RecordExtractor, VC0_HEADER_SIZE } from "./record-extractor.js"
export { SANITIZE_RULES, type SanitizeRule, sanitizeLine, splitSublines, stripLine } from "./sanitizer.js"
