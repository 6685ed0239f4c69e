/**
 * Base interfaces and types for record parsers
 */

/**
 * One parsed log record
 */
export interface LogRecord {
  /**
   * Output columns: formatted timestamp, line id, then the source columns from
   * index 1 on, with slots 4 and 5 holding the mapped type and description.
   * At least six entries; not padded to the full CSV width.
   */
  columns: string[]
  timestamp: string  // Formatted UTC time, or the raw hex when it could not be decoded
  lineId: string     // Hex line identifier from the first column
  messageCode: string
  mapped: boolean    // Whether messageCode was found in the message map
}

/**
 * Turns one logical sub-line into a record
 */
export interface RecordParser {
  /**
   * @returns The parsed record, or null when the fragment is not a record
   */
  parse(subline: string): LogRecord | null
}
