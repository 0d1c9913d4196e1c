/**
 * State Object Synchronizer
 *
 * Mirrors a workspace's current state into an object and reports the digest of
 * both sides. Each lifecycle call is a single pass over the two adapters; nothing
 * is kept between calls except the injected configuration.
 *
 * Errors never escape as exceptions: every operation returns its record together
 * with the diagnostics it collected, and stops doing work at the first error.
 */

import type {
  ImportedRecord,
  LifecycleOperation,
  OperationResult,
  ResourceId,
  SyncRecord,
} from '@tfsync/core'
import { Diagnostics } from '../diagnostics'
import type { Logger } from '../logger'
import {
  classifySyncError,
  syncBytesWrittenTotal,
  syncDigestMismatchTotal,
  syncErrorsTotal,
  syncOperationDuration,
  syncOperationsTotal,
} from '../metrics'
import { sha256Hex } from './digest'
import type { ObjectStore } from './object-store'
import { type ResourceLocation, buildResourceId, parseResourceId } from './resource-id'
import type { FetchStateResult, StateSource } from './state-source'

/**
 * Configuration for the StateObjectSynchronizer.
 */
export interface SynchronizerConfig {
  stateSource: StateSource
  objectStore: ObjectStore

  /**
   * Provider-wide soft-delete default. A record's own softDelete can only turn
   * soft delete on, never off.
   * @default false
   */
  softDelete?: boolean

  logger: Logger
}

/**
 * Status label recorded for each finished operation.
 */
type OperationStatus = 'success' | 'ignored' | 'soft_deleted' | 'failure'

interface Outcome<T> {
  record?: T
  status: OperationStatus
}

export class StateObjectSynchronizer {
  private readonly stateSource: StateSource
  private readonly objectStore: ObjectStore
  private readonly softDelete: boolean
  private readonly log: Logger

  constructor(config: SynchronizerConfig) {
    this.stateSource = config.stateSource
    this.objectStore = config.objectStore
    this.softDelete = config.softDelete ?? false
    this.log = config.logger.child({ component: 'Synchronizer' })
  }

  /**
   * Fetch the current state and write it to the object.
   * Both digests are set to the digest of the written bytes.
   */
  create(record: SyncRecord): Promise<OperationResult<SyncRecord>> {
    return this.run('create', (diags) => this.mirror('create', record, diags))
  }

  /**
   * Refresh both digests from independent reads of the workspace state and the object.
   * The digests differ when the object has drifted; nothing is reconciled here.
   */
  read(record: SyncRecord): Promise<OperationResult<SyncRecord>> {
    return this.run('read', (diags) => this.refresh(record, diags))
  }

  /**
   * Same pipeline as create, using the planned record's tags and KMS key.
   */
  update(record: SyncRecord): Promise<OperationResult<SyncRecord>> {
    return this.run('update', (diags) => this.mirror('update', record, diags))
  }

  /**
   * Delete the object, unless soft delete applies, in which case the object stays
   * and a warning is reported.
   */
  delete(record: SyncRecord): Promise<OperationResult<SyncRecord>> {
    return this.run('delete', (diags) => this.remove(record, diags))
  }

  /**
   * Adopt an existing object. The id is taken as given; the location is recovered
   * from it on the read the host performs next.
   */
  importState(id: ResourceId): OperationResult<ImportedRecord> {
    syncOperationsTotal.inc({ operation: 'import', status: 'success' })
    this.log.debug({ id }, 'import')
    return { record: { id }, diagnostics: [] }
  }

  private async mirror(
    operation: 'create' | 'update',
    record: SyncRecord,
    diags: Diagnostics,
  ): Promise<Outcome<SyncRecord>> {
    const fetched = await this.fetchState(operation, record, diags)
    if (!fetched) {
      return { status: 'failure' }
    }

    const base: SyncRecord = { ...record, id: buildResourceId(record), ignored: fetched.ignored }

    if (fetched.ignored) {
      this.log.info({ workspaceId: record.workspaceId }, 'no current state version, write skipped')
      return { record: withoutDigests(base), status: 'ignored' }
    }

    const digest = sha256Hex(fetched.contents)

    try {
      await this.objectStore.putObject({
        bucket: record.bucket,
        key: record.key,
        contents: fetched.contents,
        kmsKeyId: record.kmsKeyId,
        tags: record.tags,
      })
    } catch (err) {
      this.recordError(operation, err, diags)
      return { status: 'failure' }
    }

    syncBytesWrittenTotal.inc(fetched.contents.byteLength)
    this.log.debug(
      { workspaceId: record.workspaceId, bucket: record.bucket, key: record.key, digest },
      'state written',
    )

    // The write defines the object contents; no read-back.
    return {
      record: { ...base, stateContentsSha256: digest, bucketContentsSha256: digest },
      status: 'success',
    }
  }

  private async refresh(record: SyncRecord, diags: Diagnostics): Promise<Outcome<SyncRecord>> {
    const location = this.resolveLocation(record, diags)
    if (!location) {
      return { status: 'failure' }
    }

    const located: SyncRecord = { ...record, ...location, id: buildResourceId(location) }

    const fetched = await this.fetchState('read', located, diags)
    if (!fetched) {
      return { status: 'failure' }
    }

    if (fetched.ignored) {
      return { record: withoutDigests({ ...located, ignored: true }), status: 'ignored' }
    }

    const stateDigest = sha256Hex(fetched.contents)

    let contents: Uint8Array
    try {
      contents = await this.objectStore.getObject(location.bucket, location.key)
    } catch (err) {
      this.recordError('read', err, diags)
      return { status: 'failure' }
    }

    const bucketDigest = sha256Hex(contents)
    if (bucketDigest !== stateDigest) {
      syncDigestMismatchTotal.inc()
      this.log.info(
        { ...location, stateDigest, bucketDigest },
        'object differs from workspace state',
      )
    }

    return {
      record: {
        ...located,
        ignored: false,
        stateContentsSha256: stateDigest,
        bucketContentsSha256: bucketDigest,
      },
      status: 'success',
    }
  }

  private async remove(record: SyncRecord, diags: Diagnostics): Promise<Outcome<SyncRecord>> {
    // Soft delete succeeds even when the location cannot be resolved
    if (this.softDelete || record.softDelete) {
      const { bucket, key } = locate(record) ?? record
      diags.addWarning('using soft delete', `bucket: ${bucket}, key: ${key}`)
      this.log.warn({ id: record.id, bucket, key }, 'soft delete, object left in place')
      return { status: 'soft_deleted' }
    }

    const location = this.resolveLocation(record, diags)
    if (!location) {
      return { status: 'failure' }
    }

    try {
      await this.objectStore.deleteObject(location.bucket, location.key)
    } catch (err) {
      this.recordError('delete', err, diags)
      return { status: 'failure' }
    }

    return { status: 'success' }
  }

  private async fetchState(
    operation: LifecycleOperation,
    record: SyncRecord,
    diags: Diagnostics,
  ): Promise<FetchStateResult | undefined> {
    try {
      return await this.stateSource.fetchCurrentState(record.workspaceId, {
        ignoreEmpty: record.ignoreEmpty ?? false,
      })
    } catch (err) {
      this.recordError(operation, err, diags)
      return undefined
    }
  }

  /**
   * Location of the record. A record fresh from an import only has its id.
   */
  private resolveLocation(record: SyncRecord, diags: Diagnostics): ResourceLocation | undefined {
    const parsed = locate(record)
    if (!parsed) {
      diags.addError(
        'resource id',
        `cannot determine workspace_id, bucket and key from id "${record.id ?? ''}"; ` +
          'expected {workspace_id}/{bucket}/{key}',
      )
    }
    return parsed
  }

  private recordError(operation: LifecycleOperation, err: unknown, diags: Diagnostics): void {
    diags.addThrown(err)
    syncErrorsTotal.inc({ operation, error_type: classifySyncError(err) })
    this.log.error({ operation, err }, 'operation failed')
  }

  /**
   * Time an operation, count its outcome and package the diagnostics.
   */
  private async run(
    operation: LifecycleOperation,
    fn: (diags: Diagnostics) => Promise<Outcome<SyncRecord>>,
  ): Promise<OperationResult<SyncRecord>> {
    const diags = new Diagnostics()
    const endTimer = syncOperationDuration.startTimer({ operation })

    let outcome: Outcome<SyncRecord>
    try {
      outcome = await fn(diags)
    } catch (err) {
      this.recordError(operation, err, diags)
      outcome = { status: 'failure' }
    }

    const status: OperationStatus = diags.hasError() ? 'failure' : outcome.status
    syncOperationsTotal.inc({ operation, status })
    endTimer()

    return {
      record: status === 'failure' ? undefined : outcome.record,
      diagnostics: diags.toArray(),
    }
  }
}

/**
 * Location attributes of the record, else those encoded in its id.
 */
function locate(record: SyncRecord): ResourceLocation | undefined {
  const { workspaceId, bucket, key } = record
  if (workspaceId && bucket && key) {
    return { workspaceId, bucket, key }
  }
  return record.id ? parseResourceId(record.id) : undefined
}

function withoutDigests(record: SyncRecord): SyncRecord {
  return { ...record, stateContentsSha256: null, bucketContentsSha256: null }
}
