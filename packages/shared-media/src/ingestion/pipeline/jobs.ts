/**
 * FILE PURPOSE: Job type definitions for the ingestion queue
 */

import type { JobTypeValue } from './queue.js';

/** Payload for the INGEST_RUN job. Omitted fields fall back to worker config. */
export interface IngestRunPayload {
  sources?: string[];
  limit?: number;
}

/** Union of all ingestion job payloads. One job type today. */
export type IngestionPayload = IngestRunPayload;

/** Job data shape for the BullMQ ingestion queue. */
export interface IngestionJobData {
  type: JobTypeValue;
  payload: IngestionPayload;
  requestedAt: string;
}
