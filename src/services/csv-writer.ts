/**
 * CSV serialization for extracted records
 */

import { writeFile } from "node:fs/promises"
import type { LogRecord } from "./parsers/index.js"

// Columns 4 and 5 hold (message type, description) from the message map.
// The "Msg Description"/"Msg Category" labels do not match that content.
export const CSV_HEADER: readonly string[] = [
  "Timestamp",
  "Line ID",
  "Device Hostname",
  "Msg Code",
  "Msg Description",
  "Msg Category",
  "Log Source Type",
  "Device Network",
  "Source IP",
  ...Array.from({ length: 21 }, (_, index) => `Msg Data ${index + 10}`)
]

export const CSV_WIDTH = CSV_HEADER.length

export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * Fit columns to exactly CSV_WIDTH fields. Short rows are padded with empty
 * strings; anything past the last column is folded into it, comma-joined.
 */
export function toFixedWidth(columns: readonly string[]): string[] {
  if (columns.length <= CSV_WIDTH) {
    return [...columns, ...Array<string>(CSV_WIDTH - columns.length).fill("")]
  }

  const head = columns.slice(0, CSV_WIDTH - 1)
  const overflow = columns.slice(CSV_WIDTH - 1).join(",")
  return [...head, overflow]
}

export function formatCsvRow(fields: readonly string[]): string {
  return `${fields.map(escapeCsv).join(",")}\n`
}

export function formatCsv(records: readonly LogRecord[]): string {
  const rows = [formatCsvRow(CSV_HEADER)]
  for (const record of records) {
    rows.push(formatCsvRow(toFixedWidth(record.columns)))
  }
  return rows.join("")
}

export async function writeRecordsCsv(path: string, records: readonly LogRecord[]): Promise<void> {
  await writeFile(path, formatCsv(records), "utf-8")
}
