import { describe, expect, it } from "vitest"
import { formatEpochSeconds, formatRunTimestamp } from "./timestamp.js"

describe("formatEpochSeconds", () => {
  it("formats epoch seconds as UTC date and time", () => {
    expect(formatEpochSeconds(1600000000n)).toBe("2020-09-13 12:26:40")
    expect(formatEpochSeconds(0n)).toBe("1970-01-01 00:00:00")
    expect(formatEpochSeconds(-1n)).toBe("1969-12-31 23:59:59")
  })

  it("accepts the first and last second of years 1 to 9999", () => {
    expect(formatEpochSeconds(-62135596800n)).toBe("0001-01-01 00:00:00")
    expect(formatEpochSeconds(253402300799n)).toBe("9999-12-31 23:59:59")
  })

  it("returns null outside years 1 to 9999", () => {
    expect(formatEpochSeconds(-62135596801n)).toBeNull()
    expect(formatEpochSeconds(253402300800n)).toBeNull()
  })
})

describe("formatRunTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatRunTimestamp(new Date(2025, 0, 14, 9, 30, 12))).toBe("20250114_093012")
    expect(formatRunTimestamp(new Date(2024, 11, 31, 23, 5, 7))).toBe("20241231_230507")
  })
})
