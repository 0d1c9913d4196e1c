/**
 * Domain Error Types
 *
 * Adapters throw these; the synchronizer turns them into diagnostics so that
 * no exception crosses a lifecycle operation.
 */

/**
 * Why a remote call failed, as far as the transport can tell.
 */
export type FailureReason =
  | 'permission_denied'
  | 'not_found'
  | 'timeout'
  | 'network_error'
  | 'server_error'
  | 'invalid_request'
  | 'invalid_response'
  | 'unknown'

export interface RemoteErrorOptions {
  cause?: unknown
  /** @default 'unknown' */
  reason?: FailureReason
}

export class ProviderNotConfiguredError extends Error {
  readonly kind = 'not_configured'

  constructor(missing: string) {
    super(`nil ${missing}`)
    this.name = 'ProviderNotConfiguredError'
  }
}

export class StateVersionNotFoundError extends Error {
  readonly kind = 'state_version_not_found'

  constructor(readonly workspaceId: string) {
    super(`no current state version for workspace ${workspaceId}`)
    this.name = 'StateVersionNotFoundError'
  }
}

export class StateSourceError extends Error {
  readonly kind = 'state_source'
  readonly reason: FailureReason

  constructor(
    readonly operation: 'read current state version' | 'download state',
    readonly workspaceId: string,
    message: string,
    options: RemoteErrorOptions = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'StateSourceError'
    this.reason = options.reason ?? 'unknown'
  }
}

export class ObjectStoreError extends Error {
  readonly kind = 'object_store'
  readonly reason: FailureReason

  constructor(
    readonly operation: 'get object' | 'read body' | 'put object' | 'delete object',
    readonly bucket: string,
    readonly key: string,
    message: string,
    options: RemoteErrorOptions = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'ObjectStoreError'
    this.reason = options.reason ?? 'unknown'
  }
}

export class PutObjectValidationError extends Error {
  readonly kind = 'put_validation'

  constructor(readonly issues: string[]) {
    super(issues.join(', '))
    this.name = 'PutObjectValidationError'
  }
}

export type TfsyncError =
  | ProviderNotConfiguredError
  | StateVersionNotFoundError
  | StateSourceError
  | ObjectStoreError
  | PutObjectValidationError

export type TfsyncErrorKind = TfsyncError['kind']

/**
 * Type guard for tfsync domain errors.
 */
export function isTfsyncError(err: unknown): err is TfsyncError {
  return (
    err instanceof ProviderNotConfiguredError ||
    err instanceof StateVersionNotFoundError ||
    err instanceof StateSourceError ||
    err instanceof ObjectStoreError ||
    err instanceof PutObjectValidationError
  )
}

/**
 * Failure reason implied by an HTTP status code.
 */
export function reasonFromStatus(status: number | undefined): FailureReason {
  if (status === undefined) return 'unknown'
  if (status === 401 || status === 403) return 'permission_denied'
  if (status === 404) return 'not_found'
  if (status === 408 || status === 504) return 'timeout'
  if (status >= 500) return 'server_error'
  return 'unknown'
}

/**
 * Message of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
