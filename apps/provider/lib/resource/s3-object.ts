/**
 * tfsync_s3_object Resource
 *
 * Host-facing handlers. Each takes the record the host sends (snake_case
 * attributes), validates it, runs the synchronizer and returns the new state
 * together with diagnostics.
 */

import {
  type Diagnostic,
  type HostRecord,
  type ParseResult,
  type SyncRecord,
  type ValidationError,
  safeParseSyncRecord,
  safeParseSyncState,
  toHostRecord,
} from '@tfsync/core'
import { diagnosticsFromError } from '../diagnostics'
import { ProviderNotConfiguredError } from '../errors'
import type { StateObjectSynchronizer } from '../sync'

export const S3_OBJECT_RESOURCE_TYPE = 'tfsync_s3_object'

/**
 * Result handed back to the host. `state` is absent when the handler stopped on an
 * error, and after a delete.
 */
export interface ResourceResult<T = HostRecord> {
  state?: T
  diagnostics: Diagnostic[]
}

export class S3ObjectResource {
  readonly typeName = S3_OBJECT_RESOURCE_TYPE

  private synchronizer?: StateObjectSynchronizer

  /**
   * Attach the provider's synchronizer. Handlers report an error until this is called.
   */
  configure(synchronizer: StateObjectSynchronizer): void {
    this.synchronizer = synchronizer
  }

  async create(plan: unknown): Promise<ResourceResult> {
    return this.handle(safeParseSyncRecord(plan), (sync, record) => sync.create(record))
  }

  async read(state: unknown): Promise<ResourceResult> {
    return this.handle(safeParseSyncState(state), (sync, record) => sync.read(record))
  }

  async update(plan: unknown): Promise<ResourceResult> {
    return this.handle(safeParseSyncRecord(plan), (sync, record) => sync.update(record))
  }

  async delete(state: unknown): Promise<ResourceResult> {
    return this.handle(safeParseSyncState(state), (sync, record) => sync.delete(record))
  }

  /**
   * Passthrough import: the id becomes the state's id.
   */
  importState(id: string): ResourceResult<{ id: string }> {
    const sync = this.synchronizer
    if (!sync) {
      return { diagnostics: diagnosticsFromError(new ProviderNotConfiguredError('synchronizer')) }
    }

    const result = sync.importState(id)
    return { state: result.record, diagnostics: result.diagnostics }
  }

  private async handle(
    parsed: ParseResult<SyncRecord>,
    op: (
      sync: StateObjectSynchronizer,
      record: SyncRecord,
    ) => Promise<{ record?: SyncRecord; diagnostics: Diagnostic[] }>,
  ): Promise<ResourceResult> {
    const sync = this.synchronizer
    if (!sync) {
      return { diagnostics: diagnosticsFromError(new ProviderNotConfiguredError('synchronizer')) }
    }

    if (!parsed.success) {
      return { diagnostics: parsed.errors.map(toValidationDiagnostic) }
    }

    const result = await op(sync, parsed.data)
    return {
      state: result.record ? toHostRecord(result.record) : undefined,
      diagnostics: result.diagnostics,
    }
  }
}

/**
 * Whether moving from `prior` to `planned` must replace the resource rather than
 * update it in place. The workspace is the resource's identity.
 */
export function requiresReplace(
  prior: Pick<HostRecord, 'workspace_id'>,
  planned: Pick<HostRecord, 'workspace_id'>,
): boolean {
  return prior.workspace_id !== '' && prior.workspace_id !== planned.workspace_id
}

function toValidationDiagnostic(error: ValidationError): Diagnostic {
  return {
    severity: 'error',
    summary: 'invalid resource data',
    detail: `${error.path}: ${error.message}`,
  }
}
