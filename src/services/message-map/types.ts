/**
 * Types for the message code lookup table
 */

export interface MessageMapEntry {
  type: string
  description: string
}

/**
 * Read-only lookup from a message code to its type and description.
 * The record extractor only depends on this capability.
 */
export interface MessageMap {
  lookup(code: string): MessageMapEntry | undefined
  readonly size: number
}
