/**
 * Record extractor that composes line sanitization and record parsing
 * Provides the main API for turning .vc0 file bytes into records
 */

import { describeError } from "../../errors.js"
import type { Logger } from "../../utils/logger.js"
import type { LogRecord, RecordParser } from "./log-parsers/index.js"
import { sanitizeLine, splitSublines, stripLine } from "./sanitizer.js"

/**
 * Size of the opaque container header that precedes the log text
 */
export const VC0_HEADER_SIZE = 8192

const NEWLINE = 0x0a

export interface ExtractionStats {
  lines: number
  fragments: number
  records: number
  rejectedFragments: number
  decodeErrors: number
  unmappedRecords: number
}

export type ExtractionResult =
  | { status: "empty" }
  | { status: "parsed"; records: LogRecord[]; stats: ExtractionStats }

export class RecordExtractor {
  private strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })
  private lenientDecoder = new TextDecoder("utf-8", { ignoreBOM: true })

  constructor(
    private recordParser: RecordParser,
    private logger: Logger
  ) {}

  /**
   * Extract every record from the raw contents of one .vc0 file
   * @param bytes Whole file contents, header included
   * @param source Name used in log messages
   */
  extract(bytes: Uint8Array, source = "<buffer>"): ExtractionResult {
    if (bytes.length === VC0_HEADER_SIZE) {
      return { status: "empty" }
    }

    const stats: ExtractionStats = {
      lines: 0,
      fragments: 0,
      records: 0,
      rejectedFragments: 0,
      decodeErrors: 0,
      unmappedRecords: 0
    }
    const records: LogRecord[] = []

    for (const [lineNumber, rawLine] of this.splitLines(bytes.subarray(VC0_HEADER_SIZE))) {
      stats.lines++
      const line = this.decodeLine(rawLine, source, lineNumber, stats)

      for (const fragment of splitSublines(sanitizeLine(stripLine(line)))) {
        stats.fragments++
        const record = this.recordParser.parse(fragment)
        if (!record) {
          stats.rejectedFragments++
          this.logger.trace(`${source}:${lineNumber} dropped fragment: ${fragment}`)
          continue
        }

        if (!record.mapped) {
          stats.unmappedRecords++
        }
        records.push(record)
      }
    }

    stats.records = records.length
    return { status: "parsed", records, stats }
  }

  /**
   * Yield `\n`-terminated byte lines with their 1-based line numbers.
   * A final line without a terminator is included.
   */
  private *splitLines(body: Uint8Array): Generator<[number, Uint8Array]> {
    let start = 0
    let lineNumber = 0

    while (start < body.length) {
      const end = body.indexOf(NEWLINE, start)
      const stop = end === -1 ? body.length : end
      lineNumber++
      yield [lineNumber, body.subarray(start, stop)]
      start = stop + 1
    }
  }

  private decodeLine(rawLine: Uint8Array, source: string, lineNumber: number, stats: ExtractionStats): string {
    try {
      return this.strictDecoder.decode(rawLine)
    } catch (error) {
      stats.decodeErrors++
      this.logger.warn(`Invalid UTF-8 in '${source}' line ${lineNumber}, replacing bad bytes: ${describeError(error)}`)
      return this.lenientDecoder.decode(rawLine)
    }
  }
}
