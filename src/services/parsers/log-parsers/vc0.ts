/**
 * Parser for the comma/tab separated records recovered from .vc0 lines.
 *
 * Record layout: `<hexTimestamp>.<hexLineID>,<col1>,<col2>,<messageCode>,...`
 */

import type { MessageMap } from "../../message-map/index.js"
import { formatEpochSeconds } from "../../../utils/timestamp.js"
import type { LogRecord, RecordParser } from "./base.js"

const MIN_COLUMNS = 4
const MAPPED_TYPE_INDEX = 4
const MAPPED_DESCRIPTION_INDEX = 5

const HEX_INTEGER = /^\s*([+-]?)(?:0[xX])?([0-9a-fA-F]+(?:_[0-9a-fA-F]+)*)\s*$/

/**
 * Decode a hex epoch-seconds value into `YYYY-MM-DD HH:MM:SS` (UTC).
 * Anything that is not hex, or falls outside years 1 to 9999, is returned
 * unchanged.
 */
export function decodeHexTimestamp(raw: string): string {
  const match = HEX_INTEGER.exec(raw)
  if (!match) {
    return raw
  }

  const [, sign, digits] = match
  const magnitude = BigInt(`0x${digits.replace(/_/g, "")}`)
  const seconds = sign === "-" ? -magnitude : magnitude

  return formatEpochSeconds(seconds) ?? raw
}

export class Vc0RecordParser implements RecordParser {
  constructor(private messageMap: MessageMap) {}

  parse(subline: string): LogRecord | null {
    const columns = subline.replace(/\t/g, ",").split(",")

    // A single trailing character is a delimiter artifact
    if (columns[columns.length - 1].length === 1) {
      columns[columns.length - 1] = ""
    }

    const separator = columns[0].indexOf(".")
    if (separator === -1 || columns.length < MIN_COLUMNS) {
      return null
    }

    const rawTimestamp = columns[0].slice(0, separator)
    const lineId = columns[0].slice(separator + 1)
    const messageCode = columns[3].trim()
    const timestamp = decodeHexTimestamp(rawTimestamp)

    columns[0] = timestamp
    columns.splice(1, 0, lineId)

    while (columns.length <= MAPPED_DESCRIPTION_INDEX) {
      columns.push("")
    }

    const entry = this.messageMap.lookup(messageCode)
    columns[MAPPED_TYPE_INDEX] = entry?.type ?? ""
    columns[MAPPED_DESCRIPTION_INDEX] = entry?.description ?? ""

    return {
      columns,
      timestamp,
      lineId,
      messageCode,
      mapped: entry !== undefined
    }
  }
}
