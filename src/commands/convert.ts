/**
 * Batch conversion of a directory of .vc0 files into CSV.
 *
 * Each input file is handled on its own: a file that cannot be read or
 * written is reported and counted, and the batch moves on.
 */

import { mkdir, readdir, readFile, stat } from "node:fs/promises"
import { join } from "node:path"
import { ConversionError, describeError } from "../errors.js"
import { writeRecordsCsv } from "../services/csv-writer.js"
import { loadMessageMap } from "../services/message-map/index.js"
import { type ExtractionStats, RecordExtractor, VC0_HEADER_SIZE, Vc0RecordParser } from "../services/parsers/index.js"
import type { Logger } from "../utils/logger.js"
import { buildOutputFilename, isConvertibleLogFile, VC0_EXTENSION } from "../utils/output-filename.js"
import { formatRunTimestamp } from "../utils/timestamp.js"

export interface ConvertOptions {
  inputDir: string
  outputDir: string
  mapFile: string
  now?: Date // Run timestamp embedded in output names (default: current time)
}

export type FileResult =
  | { file: string; status: "converted"; outputPath: string; stats: ExtractionStats }
  | { file: string; status: "skipped-empty" }
  | { file: string; status: "failed"; error: string }

export interface ConversionSummary {
  files: FileResult[]
  converted: number
  skipped: number
  failed: number
  records: number
}

async function assertDirectory(path: string): Promise<void> {
  let isDirectory: boolean
  try {
    isDirectory = (await stat(path)).isDirectory()
  } catch {
    throw new ConversionError("INPUT_DIR_MISSING", `Input directory '${path}' does not exist.`)
  }

  if (!isDirectory) {
    throw new ConversionError("INPUT_NOT_DIRECTORY", `Input path '${path}' is not a directory.`)
  }
}

async function listLogFiles(inputDir: string): Promise<string[]> {
  const entries = await readdir(inputDir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && isConvertibleLogFile(entry.name))
    .map((entry) => entry.name)
    .sort()
}

async function convertFile(
  file: string,
  options: ConvertOptions,
  runTimestamp: string,
  extractor: RecordExtractor,
  logger: Logger
): Promise<FileResult> {
  const inputPath = join(options.inputDir, file)

  try {
    const bytes = await readFile(inputPath)
    const result = extractor.extract(bytes, file)

    if (result.status === "empty") {
      logger.info(`Skipping '${file}': file is empty (${VC0_HEADER_SIZE} bytes).`)
      return { file, status: "skipped-empty" }
    }

    const outputPath = join(options.outputDir, buildOutputFilename(runTimestamp, file))
    await writeRecordsCsv(outputPath, result.records)

    logger.info(`Processed and wrote CSV: ${outputPath} (${result.stats.records} records)`)
    logger.debug(
      `${file}: ${result.stats.lines} lines, ${result.stats.fragments} fragments, ` +
        `${result.stats.rejectedFragments} rejected, ${result.stats.unmappedRecords} unmapped codes, ` +
        `${result.stats.decodeErrors} decode errors`
    )
    return { file, status: "converted", outputPath, stats: result.stats }
  } catch (error) {
    const message = describeError(error)
    logger.error(`Failed to convert '${inputPath}': ${message}`)
    return { file, status: "failed", error: message }
  }
}

export function summarize(files: FileResult[]): ConversionSummary {
  const summary: ConversionSummary = { files, converted: 0, skipped: 0, failed: 0, records: 0 }

  for (const result of files) {
    switch (result.status) {
      case "converted":
        summary.converted++
        summary.records += result.stats.records
        break
      case "skipped-empty":
        summary.skipped++
        break
      case "failed":
        summary.failed++
        break
    }
  }

  return summary
}

/**
 * Convert every eligible .vc0 file in `options.inputDir`.
 * @throws ConversionError when the input directory is missing
 */
export async function convertDirectory(options: ConvertOptions, logger: Logger): Promise<ConversionSummary> {
  await assertDirectory(options.inputDir)

  const messageMap = await loadMessageMap(options.mapFile, logger.child("map"))
  await mkdir(options.outputDir, { recursive: true })

  const files = await listLogFiles(options.inputDir)
  if (files.length === 0) {
    logger.warn(`No ${VC0_EXTENSION} files found in '${options.inputDir}'.`)
    return summarize([])
  }

  const runTimestamp = formatRunTimestamp(options.now ?? new Date())
  const extractor = new RecordExtractor(new Vc0RecordParser(messageMap), logger.child("extract"))
  const fileLogger = logger.child("convert")

  const results: FileResult[] = []
  for (const file of files) {
    results.push(await convertFile(file, options, runTimestamp, extractor, fileLogger))
  }

  return summarize(results)
}
