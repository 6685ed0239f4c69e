/**
 * Loads the `MessageCode,MessageType,Description` table.
 *
 * No header row is expected. Rows that do not have exactly three fields, or
 * whose code is empty after trimming, are skipped. Later rows overwrite
 * earlier ones with the same code.
 */

import { createReadStream } from "node:fs"
import csv from "csv-parser"
import { describeError } from "../../errors.js"
import type { Logger } from "../../utils/logger.js"
import type { MessageMap, MessageMapEntry } from "./types.js"

export function createMessageMap(entries: Iterable<readonly [string, MessageMapEntry]>): MessageMap {
  const table = new Map<string, MessageMapEntry>()
  for (const [code, entry] of entries) {
    table.set(code, Object.freeze({ ...entry }))
  }

  return {
    lookup: (code) => table.get(code),
    get size() {
      return table.size
    }
  }
}

function toEntry(row: Record<string, string>): [string, MessageMapEntry] | null {
  const cells = Object.values(row)
  if (cells.length !== 3) return null

  const [code, type, description] = cells.map((cell) => cell.trim())
  if (!code) return null

  return [code, { type, description }]
}

/**
 * Read the mapping table at `path`. A missing or unreadable file is reported
 * and yields an empty map so conversion can still run without enrichment.
 */
export async function loadMessageMap(path: string, logger: Logger): Promise<MessageMap> {
  const entries: Array<[string, MessageMapEntry]> = []
  let skipped = 0

  try {
    await new Promise<void>((resolve, reject) => {
      createReadStream(path)
        .on("error", reject)
        .pipe(csv({ headers: false }))
        .on("data", (row: Record<string, string>) => {
          const entry = toEntry(row)
          if (entry) {
            entries.push(entry)
          } else {
            skipped++
          }
        })
        .on("end", resolve)
        .on("error", reject)
    })
  } catch (error) {
    logger.error(`Error opening or reading the message map file '${path}': ${describeError(error)}`)
    return createMessageMap([])
  }

  const map = createMessageMap(entries)
  logger.debug(`Loaded ${map.size} message codes from '${path}' (${skipped} malformed rows skipped)`)
  return map
}
