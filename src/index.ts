/**
 * Haul - file transfer engine and CLI
 *
 * Main entry point and exports for programmatic usage.
 */

export { run } from '@oclif/core'

export { TransferEngine } from './engine/engine.js'
export type {
  EngineEvent,
  EngineListener,
  LifecycleKind,
  TransferEngineOptions,
} from './engine/engine.js'
export { FileEnumerator } from './engine/enumerator.js'
export type { EnumeratorOptions } from './engine/enumerator.js'
export { TransferWorker } from './engine/worker.js'
export type { FileOutcome, TransferContext, WorkerOptions, WorkerSink } from './engine/worker.js'
export { RateEstimator } from './engine/rateEstimator.js'
export type { RateEstimatorOptions } from './engine/rateEstimator.js'
export { ProgressAggregator, isTerminal } from './engine/aggregator.js'
export type { AggregatorEvent, AggregatorOptions } from './engine/aggregator.js'
export { NotificationQueue } from './engine/notifications.js'
export type { NotificationQueueOptions, NotificationState } from './engine/notifications.js'
export { CancellationToken, PauseGate } from './engine/cancellation.js'
export { nodeFileSystem } from './engine/fileSystem.js'
export type { FileStats, ReadHandle, TransferFileSystem, WriteHandle } from './engine/fileSystem.js'
export type { Clock } from './engine/clock.js'
export { monotonicClock } from './engine/clock.js'
export * from './engine/errors.js'
export * from './engine/types.js'

export { loadConfig, configLoader } from './config/loader.js'
export type { LoadOptions } from './config/loader.js'
export { DEFAULT_CONFIG } from './config/schema.js'
export type { HaulConfig, PartialHaulConfig } from './config/schema.js'

export { formatDuration, formatRate, formatSize } from './utils/format.js'
export { renderProgress, renderProgressLine } from './utils/progressDisplay.js'
export type { Logger } from './utils/logger.js'
export { silentLogger } from './utils/logger.js'
