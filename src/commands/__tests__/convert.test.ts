/**
 * End-to-end tests for converting a directory of .vc0 files
 */

import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { ConversionError } from "../../errors.js"
import { CSV_HEADER } from "../../services/csv-writer.js"
import { VC0_HEADER_SIZE } from "../../services/parsers/index.js"
import { Logger, LogLevel } from "../../utils/logger.js"
import { convertDirectory } from "../convert.js"

const RUN_TIME = new Date(2025, 0, 14, 9, 30, 12)
const HEADER_LINE = CSV_HEADER.join(",")
const MAPPED_ROW = `1970-01-20 20:23:24,00,0,,AdminChange,addServer${",".repeat(24)}`

function vc0Bytes(body: string): Buffer {
  return Buffer.concat([Buffer.alloc(VC0_HEADER_SIZE), Buffer.from(body, "utf-8")])
}

describe("convertDirectory", () => {
  let tempDir: string
  let inputDir: string
  let outputDir: string
  let mapFile: string
  let logger: Logger

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), "vc0-convert-"))
    inputDir = path.join(tempDir, "in")
    outputDir = path.join(tempDir, "out", "nested")
    mapFile = path.join(tempDir, "codes.csv")
    mkdirSync(inputDir)
    writeFileSync(mapFile, "ADM23247,AdminChange,addServer\n")

    logger = new Logger({ level: LogLevel.ERROR, enableColors: false })
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "warn").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it("converts eligible files and skips empty, lock and foreign files", async () => {
    writeFileSync(path.join(inputDir, "A.vc0"), vc0Bytes("1A2B3C.00,0,,ADM23247,,\n"))
    writeFileSync(path.join(inputDir, "B.vc0"), Buffer.alloc(VC0_HEADER_SIZE))
    writeFileSync(path.join(inputDir, "lck.C.vc0"), vc0Bytes("1A2B3C.00,0,,ADM23247,,\n"))
    writeFileSync(path.join(inputDir, "notes.txt"), "not a log")
    mkdirSync(path.join(inputDir, "D.vc0"))

    const summary = await convertDirectory({ inputDir, outputDir, mapFile, now: RUN_TIME }, logger)

    expect(summary.files.map((result) => [result.file, result.status])).toEqual([
      ["A.vc0", "converted"],
      ["B.vc0", "skipped-empty"]
    ])
    expect(summary).toMatchObject({ converted: 1, skipped: 1, failed: 0, records: 1 })

    expect(readdirSync(outputDir)).toEqual(["20250114_093012_A.vc0.csv"])
    const csv = readFileSync(path.join(outputDir, "20250114_093012_A.vc0.csv"), "utf-8")
    expect(csv).toBe(`${HEADER_LINE}\n${MAPPED_ROW}\n`)
  })

  it("writes a header-only CSV when no fragment parses", async () => {
    writeFileSync(path.join(inputDir, "noise.vc0"), vc0Bytes("ab\nno timestamp here,x,y,z\n"))

    const summary = await convertDirectory({ inputDir, outputDir, mapFile, now: RUN_TIME }, logger)

    expect(summary).toMatchObject({ converted: 1, records: 0 })
    expect(readFileSync(path.join(outputDir, "20250114_093012_noise.vc0.csv"), "utf-8")).toBe(`${HEADER_LINE}\n`)
  })

  it("leaves the mapped columns empty when the map file is missing", async () => {
    writeFileSync(path.join(inputDir, "A.vc0"), vc0Bytes("1A2B3C.00,0,,ADM23247,,\n"))

    const summary = await convertDirectory(
      { inputDir, outputDir, mapFile: path.join(tempDir, "missing.csv"), now: RUN_TIME },
      logger
    )

    expect(summary.converted).toBe(1)
    const [, row] = readFileSync(path.join(outputDir, "20250114_093012_A.vc0.csv"), "utf-8").split("\n")
    expect(row).toBe(`1970-01-20 20:23:24,00,0,,,${",".repeat(24)}`)
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining("[map] Error opening or reading the message map file")
    )
  })

  it("reports a failed file and continues with the rest", async () => {
    writeFileSync(path.join(inputDir, "A.vc0"), vc0Bytes("1A2B3C.00,0,,ADM23247,,\n"))
    writeFileSync(path.join(inputDir, "E.vc0"), vc0Bytes("5F5E1000.01,h,x,OTHER\n"))
    // A directory where A's CSV should go makes that write fail
    mkdirSync(path.join(outputDir, "20250114_093012_A.vc0.csv"), { recursive: true })

    const summary = await convertDirectory({ inputDir, outputDir, mapFile, now: RUN_TIME }, logger)

    expect(summary.files.map((result) => result.status)).toEqual(["failed", "converted"])
    expect(summary).toMatchObject({ converted: 1, failed: 1, records: 1 })
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("[convert] Failed to convert"))

    const [, row] = readFileSync(path.join(outputDir, "20250114_093012_E.vc0.csv"), "utf-8").split("\n")
    expect(row).toBe(`2020-09-13 12:26:40,01,h,x,,${",".repeat(24)}`)
  })

  it("returns an empty summary when there is nothing to convert", async () => {
    writeFileSync(path.join(inputDir, "lck.A.vc0"), vc0Bytes("1A2B3C.00,0,,ADM23247,,\n"))
    const warnLogger = new Logger({ level: LogLevel.WARN, enableColors: false })

    const summary = await convertDirectory({ inputDir, outputDir, mapFile, now: RUN_TIME }, warnLogger)

    expect(summary).toEqual({ files: [], converted: 0, skipped: 0, failed: 0, records: 0 })
    expect(console.warn).toHaveBeenCalledWith(`[WARN]  No .vc0 files found in '${inputDir}'.`)
    expect(existsSync(outputDir)).toBe(true)
  })

  it("fails the run when the input directory does not exist", async () => {
    const missing = path.join(tempDir, "absent")

    await expect(convertDirectory({ inputDir: missing, outputDir, mapFile }, logger)).rejects.toMatchObject({
      name: "ConversionError",
      code: "INPUT_DIR_MISSING"
    })
  })

  it("fails the run when the input path is a file", async () => {
    await expect(convertDirectory({ inputDir: mapFile, outputDir, mapFile }, logger)).rejects.toBeInstanceOf(
      ConversionError
    )
  })
})
