import * as path from 'path'
import type { AggregateProgress, Notification, NotificationSeverity } from '../engine/types.js'
import { formatRate } from './format.js'

/**
 * Text rendering of progress snapshots and notifications for the terminal
 */

export const DEFAULT_BAR_WIDTH = 20

const SEVERITY_SYMBOLS: Record<NotificationSeverity, string> = {
  info: 'ℹ',
  success: '✔',
  warning: '⚠',
  error: '✖',
}

/**
 * Render a fixed-width bar
 *
 * @example renderBar(25, 8) // '[##------]'
 */
export function renderBar(percent: number, width: number = DEFAULT_BAR_WIDTH): string {
  const clamped = Math.min(100, Math.max(0, percent))
  const filled = Math.round((clamped / 100) * width)
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`
}

/**
 * One line with the bar and every progress slot
 *
 * @example
 * renderProgressLine(snapshot)
 * // '[####----------------]  20% | 1 / 5 files | 1 KB / 5 KB | 512 B/s | ETA 00:00:08 | 00:00:02'
 */
export function renderProgressLine(
  snapshot: AggregateProgress,
  width: number = DEFAULT_BAR_WIDTH
): string {
  return [
    `${renderBar(snapshot.percent, width)} ${String(snapshot.percent).padStart(3)}%`,
    `${snapshot.filesText} files`,
    snapshot.sizeText,
    formatRate(snapshot.bytesPerSecond),
    `ETA ${snapshot.etaText}`,
    snapshot.elapsedText,
  ].join(' | ')
}

/**
 * Directory being copied: the source root joined with the current folder
 */
export function currentFolder(snapshot: AggregateProgress): string {
  const { sourceRoot, folderPath } = snapshot
  if (folderPath === '' || folderPath === '.') {
    return sourceRoot
  }
  return path.join(sourceRoot, ...folderPath.split('/'))
}

/**
 * Status line, current folder, then the progress line
 */
export function renderProgress(snapshot: AggregateProgress, width?: number): string {
  return [
    snapshot.statusText,
    `  Folder: ${currentFolder(snapshot)}`,
    `  ${renderProgressLine(snapshot, width)}`,
  ].join('\n')
}

export function renderNotification(notification: Notification): string {
  return `${SEVERITY_SYMBOLS[notification.severity]} ${notification.message}`
}
