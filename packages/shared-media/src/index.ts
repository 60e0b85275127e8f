/**
 * FILE PURPOSE: Barrel export for the ingestion core
 *
 * Import: `import { executeIngestionRun, KnownItemIndex } from '@memefeed/shared-media'`
 */

export * from './ingestion/index.js';

export { FallbackMonitor } from './fallback-monitor.js';
export type { FallbackEvent, FallbackStats, AlertLevel, DegradableStage } from './fallback-monitor.js';

export { IndexLoadError, BatchWriteError } from './errors.js';

export { succeed, fail, describeError } from './outcome.js';
export type { Outcome } from './outcome.js';

export { stderrLog, silentLog } from './log.js';
export type { LogSink, LogLevel } from './log.js';
