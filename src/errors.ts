/**
 * Run-level failures that stop a conversion before any file is processed.
 * Per-file and per-line problems are logged and never surface as exceptions.
 */

export type ConversionErrorCode = "INPUT_DIR_MISSING" | "INPUT_NOT_DIRECTORY" | "INVALID_LOG_LEVEL" | "MISSING_OPTION"

export class ConversionError extends Error {
  readonly code: ConversionErrorCode

  constructor(code: ConversionErrorCode, message: string) {
    super(message)
    this.name = "ConversionError"
    this.code = code
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
