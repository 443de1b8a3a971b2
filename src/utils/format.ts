/**
 * Display formatting for the presentation slots
 */

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'] as const

export const UNKNOWN_DURATION = '--:--:--'

/**
 * Format a byte count with a 1024 base
 *
 * @example formatSize(1536) // '1.5 KB'
 */
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 1) {
    return '0 B'
  }

  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1)
  const value = Math.round((bytes / Math.pow(1024, exponent)) * 100) / 100
  return `${value} ${SIZE_UNITS[exponent]}`
}

/**
 * Format seconds as HH:MM:SS
 *
 * Unknown (null/undefined), negative and non-finite values render as '--:--:--'.
 */
export function formatDuration(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds) || seconds < 0) {
    return UNKNOWN_DURATION
  }

  const total = Math.floor(seconds)
  const hours = Math.floor(total / 3600)
  const minutes = Math.floor((total % 3600) / 60)
  const secs = total % 60
  return [hours, minutes, secs].map((part) => String(part).padStart(2, '0')).join(':')
}

/**
 * Format a throughput value
 */
export function formatRate(bytesPerSecond: number): string {
  return `${formatSize(bytesPerSecond)}/s`
}

/**
 * Pluralize a count
 *
 * @example pluralize(1, 'file') // '1 file'
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}
