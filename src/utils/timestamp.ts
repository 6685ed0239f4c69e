/**
 * Date formatting shared by the record parser and the batch driver
 */

// Range a calendar year 1..9999 covers, in epoch seconds
const MIN_EPOCH_SECONDS = -62135596800n
const MAX_EPOCH_SECONDS = 253402300799n

/**
 * Format epoch seconds as UTC `YYYY-MM-DD HH:MM:SS`
 * @returns The formatted string, or null when the value is outside years 1 to 9999
 */
export function formatEpochSeconds(seconds: bigint): string | null {
  if (seconds < MIN_EPOCH_SECONDS || seconds > MAX_EPOCH_SECONDS) {
    return null
  }

  const iso = new Date(Number(seconds) * 1000).toISOString()
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`
}

/**
 * Local-time `YYYYMMDD_HHMMSS`, used to tag every output file of one run
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, "0")

  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`

  return `${day}_${time}`
}
