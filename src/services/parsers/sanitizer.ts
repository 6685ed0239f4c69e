/**
 * Character clean-up for decoded .vc0 lines.
 *
 * A physical line in a .vc0 file can hold several records separated by
 * control characters. The rules below turn those separators into newlines,
 * drop formatting noise and mask whatever is left outside printable ASCII.
 * Rules run in order and each one only sees the output of the previous one.
 */

export interface SanitizeRule {
  name: string
  pattern: RegExp
  replacement: string
}

export const SANITIZE_RULES: readonly SanitizeRule[] = [
  {
    name: "record-separators",
    pattern: /[\x00-\x05\x12\x13\x15\x17]/g,
    replacement: "\n"
  },
  {
    name: "bell",
    pattern: /\x07/g,
    replacement: " "
  },
  {
    name: "formatting-controls",
    pattern: /[\x06\x08\x0B\x0C\x0E-\x11\x14\x16-\x1F\x7F\uFFFD]/g,
    replacement: ""
  },
  {
    // Printable ASCII plus \t \n \r \v \f; astral code points count once
    name: "non-printable",
    pattern: /[^\x20-\x7E\t\n\r\x0B\x0C]/gu,
    replacement: "?"
  }
]

// Whitespace a text-mode line reader strips: ASCII whitespace, the
// information separators 0x1C-0x1F, NEL, NBSP and the Unicode spaces.
// U+FEFF is not in the set: a byte-order mark is masked, not stripped.
const LINE_WHITESPACE = "\\t\\n\\x0B\\x0C\\r\\x1C-\\x1F \\x85\\xA0\\u1680\\u2000-\\u200A\\u2028\\u2029\\u202F\\u205F\\u3000"
const LINE_EDGES = new RegExp(`^[${LINE_WHITESPACE}]+|[${LINE_WHITESPACE}]+$`, "g")

export function stripLine(line: string): string {
  return line.replace(LINE_EDGES, "")
}

export function sanitizeLine(line: string, rules: readonly SanitizeRule[] = SANITIZE_RULES): string {
  return rules.reduce((current, rule) => current.replace(rule.pattern, rule.replacement), line)
}

/**
 * Split a sanitized line into trimmed candidate records, dropping fragments
 * under three characters
 */
export function splitSublines(sanitized: string): string[] {
  return sanitized
    .split("\n")
    .map((fragment) => fragment.trim())
    .filter((fragment) => fragment.length >= 3)
}
