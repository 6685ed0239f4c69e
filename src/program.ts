import chalk from "chalk"
import { Command } from "commander"
import { readFileSync } from "fs"
import { dirname, join } from "path"
import { fileURLToPath } from "url"
import { type ConversionSummary, type ConvertOptions, convertDirectory } from "./commands/convert.js"
import { ConversionError } from "./errors.js"
import { defaultLogger, type Logger, LogLevel, tryParseLogLevel } from "./utils/logger.js"
import { loadUserConfig } from "./utils/user-config.js"

export type CliOptions = {
  input?: string
  output?: string
  mapfile?: string
  logLevel?: string
  debug?: boolean
}

// Read version from package.json
function getVersion(): string {
  try {
    const currentFile = fileURLToPath(import.meta.url)
    const packageRoot = dirname(dirname(currentFile)) // Up from src/ or dist/ to package root
    const packageJson: unknown = JSON.parse(readFileSync(join(packageRoot, "package.json"), "utf8"))
    const version = typeof packageJson === "object" && packageJson !== null ? Reflect.get(packageJson, "version") : ""
    return typeof version === "string" && version ? version : "0.0.0"
  } catch {
    return "0.0.0"
  }
}

/**
 * Resolve the level the run should log at. `--debug` wins over `--log-level`.
 * @throws ConversionError for an unknown level name
 */
export function resolveLogLevel(options: CliOptions): LogLevel | undefined {
  if (options.debug) {
    return LogLevel.DEBUG
  }
  if (options.logLevel === undefined) {
    return undefined
  }

  const level = tryParseLogLevel(options.logLevel)
  if (level === undefined) {
    throw new ConversionError(
      "INVALID_LOG_LEVEL",
      `Invalid log level: ${options.logLevel}. Valid levels: ERROR, WARN, INFO, DEBUG, TRACE`
    )
  }
  return level
}

/**
 * @throws ConversionError when a required path was given neither on the
 * command line nor in the user config
 */
export function resolveConvertOptions(options: CliOptions): ConvertOptions {
  const missing = (["input", "output", "mapfile"] as const).filter((key) => !options[key]).map((key) => `--${key}`)

  if (!options.input || !options.output || !options.mapfile) {
    throw new ConversionError("MISSING_OPTION", `Missing required option(s): ${missing.join(", ")}`)
  }

  return { inputDir: options.input, outputDir: options.output, mapFile: options.mapfile }
}

function reportSummary(summary: ConversionSummary, logger: Logger): void {
  logger.logFields(LogLevel.INFO, "Conversion finished", {
    converted: summary.converted,
    "skipped (empty)": summary.skipped,
    failed: summary.failed,
    records: summary.records
  })
}

export function createProgram(logger: Logger = defaultLogger): Command {
  const userConfig = loadUserConfig()
  const version = getVersion()
  const program = new Command()

  program
    .name("vc0-csv")
    .description("Convert .vc0 industrial control system logs to CSV")
    .version(version)
    .option("-i, --input <dir>", "Directory containing .vc0 files")
    .option("-o, --output <dir>", "Directory to save .csv files", userConfig.outputDir)
    .option("-m, --mapfile <file>", "CSV file mapping MessageCode,MessageType,Description", userConfig.mapFile)
    .option("--log-level <level>", "Log level: ERROR, WARN, INFO, DEBUG or TRACE", userConfig.logLevel)
    .option("--debug", "Enable debug logging (same as --log-level DEBUG)")
    .action(async () => {
      const options = program.opts<CliOptions>()

      const level = resolveLogLevel(options)
      if (level !== undefined) {
        logger.setLevel(level)
      }
      const convertOptions = resolveConvertOptions(options)

      console.log(chalk.cyan(`\nvc0-csv v${version}\n`))

      const summary = await convertDirectory(convertOptions, logger)
      reportSummary(summary, logger)
    })

  return program
}
