/**
 * Sync Metrics
 *
 * Metrics for lifecycle operations on mirrored state objects.
 */

import { Counter, Histogram } from 'prom-client'
import {
  type FailureReason,
  ObjectStoreError,
  StateSourceError,
  type TfsyncErrorKind,
  isTfsyncError,
} from '../errors'
import { registry } from './registry'

// Each operation is one or two remote round trips
const operationBuckets = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30]

export const syncOperationsTotal = new Counter({
  name: 'tfsync_operations_total',
  help: 'Total lifecycle operations',
  labelNames: ['operation', 'status'],
  registers: [registry],
})

export const syncOperationDuration = new Histogram({
  name: 'tfsync_operation_duration_seconds',
  help: 'Lifecycle operation duration',
  labelNames: ['operation'],
  buckets: operationBuckets,
  registers: [registry],
})

export const syncBytesWrittenTotal = new Counter({
  name: 'tfsync_bytes_written_total',
  help: 'Cumulative state bytes written to the object store',
  registers: [registry],
})

export const syncDigestMismatchTotal = new Counter({
  name: 'tfsync_digest_mismatch_total',
  help: 'Reads where the object digest differed from the workspace state digest',
  registers: [registry],
})

export const syncErrorsTotal = new Counter({
  name: 'tfsync_errors_total',
  help: 'Errors by type',
  labelNames: ['operation', 'error_type'],
  registers: [registry],
})

/**
 * error_type label: the transport's failure reason for remote errors, the error
 * kind for other tfsync errors.
 */
export function classifySyncError(error: unknown): FailureReason | TfsyncErrorKind {
  if (error instanceof StateSourceError || error instanceof ObjectStoreError) {
    return error.reason
  }
  return isTfsyncError(error) ? error.kind : 'unknown'
}
