/**
 * Naming rules for .vc0 inputs and the CSV files written for them
 *
 * Output files follow the pattern: <YYYYMMDD_HHMMSS>_<input name>.csv
 * Example: 20250114_093012_ALARMS01.vc0.csv
 */

export const VC0_EXTENSION = ".vc0"

// Files the logging system holds open while writing are named lck.<name>
export const LOCK_FILE_PREFIX = "lck."

export function isLockFile(filename: string): boolean {
  return filename.startsWith(LOCK_FILE_PREFIX)
}

/**
 * Check whether a directory entry should be converted
 */
export function isConvertibleLogFile(filename: string): boolean {
  return filename.endsWith(VC0_EXTENSION) && !isLockFile(filename)
}

export function buildOutputFilename(runTimestamp: string, inputFilename: string): string {
  return `${runTimestamp}_${inputFilename}.csv`
}
