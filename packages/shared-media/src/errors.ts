/**
 * FILE PURPOSE: Run-level (fatal) errors for the ingestion pipeline
 *
 * WHY: Per-item failures degrade to Outcome values. These two cannot:
 *      without the known-item index every candidate would look unique,
 *      and a failed batch write must reach the caller.
 */

export class IndexLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Failed to load known items: ${message}`, options);
    this.name = 'IndexLoadError';
  }
}

export class BatchWriteError extends Error {
  readonly recordCount: number;

  constructor(recordCount: number, message: string, options?: { cause?: unknown }) {
    super(`Failed to insert ${recordCount} records: ${message}`, options);
    this.name = 'BatchWriteError';
    this.recordCount = recordCount;
  }
}
