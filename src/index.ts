/**
 * Programmatic API
 */

export { type ConversionSummary, type ConvertOptions, convertDirectory, type FileResult } from "./commands/convert.js"
export { ConversionError, type ConversionErrorCode } from "./errors.js"
export { CSV_HEADER, formatCsv, writeRecordsCsv } from "./services/csv-writer.js"
export { createMessageMap, loadMessageMap, type MessageMap, type MessageMapEntry } from "./services/message-map/index.js"
export {
  type ExtractionResult,
  type ExtractionStats,
  type LogRecord,
  RecordExtractor,
  sanitizeLine,
  VC0_HEADER_SIZE,
  Vc0RecordParser
} from "./services/parsers/index.js"
export { Logger, LogLevel } from "./utils/logger.js"
