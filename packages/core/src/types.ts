/**
 * Core types for tfsync, the Terraform state to object store mirror
 */

// =============================================================================
// ID Types
// =============================================================================

/**
 * Terraform Cloud/Enterprise workspace identifier.
 * @example 'ws-2Yw1pQm7Xk9aBcDe'
 */
export type WorkspaceId = string

/**
 * Composite resource identifier in `{workspaceId}/{bucket}/{key}` form.
 * @example 'ws-2Yw1pQm7Xk9aBcDe/state-mirror/prod/network.tfstate'
 */
export type ResourceId = string

// =============================================================================
// Sync Record
// =============================================================================

/**
 * The desired/actual state record exchanged with the host for one mirrored object.
 */
export interface SyncRecord {
  /**
   * Derived from workspaceId, bucket and key. Absent until the first create or read.
   * @example 'ws-2Yw1pQm7Xk9aBcDe/state-mirror/prod/network.tfstate'
   */
  id?: ResourceId

  /**
   * Workspace whose current state is mirrored.
   * @example 'ws-2Yw1pQm7Xk9aBcDe'
   */
  workspaceId: WorkspaceId

  /**
   * Target bucket.
   * @example 'state-mirror'
   */
  bucket: string

  /**
   * Target object key.
   * @example 'prod/network.tfstate'
   */
  key: string

  /**
   * KMS key used for server-side encryption of writes.
   * @example 'arn:aws:kms:eu-west-1:111122223333:key/example'
   */
  kmsKeyId?: string

  /**
   * Treat a workspace without a current state version as a no-op instead of an error.
   */
  ignoreEmpty?: boolean

  /**
   * True when the last operation found no state and ignoreEmpty was set.
   */
  ignored?: boolean

  /**
   * Leave the backing object in place when the record is deleted.
   */
  softDelete?: boolean

  /**
   * Hex SHA-256 of the fetched workspace state. Null when ignored.
   */
  stateContentsSha256?: string | null

  /**
   * Hex SHA-256 of the object contents (read) or the written contents (create/update).
   * Null when ignored.
   */
  bucketContentsSha256?: string | null

  /**
   * Tags applied to the object on write.
   * @example { team: 'platform' }
   */
  tags?: Record<string, string>
}

/**
 * Record produced by an import: only the identifier is known until the next read.
 */
export interface ImportedRecord {
  id: ResourceId
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * Severity of a diagnostic.
 * - `error`: the operation stopped and performed no further side effects
 * - `warning`: informational, the operation continued
 */
export type DiagnosticSeverity = 'error' | 'warning'

/**
 * A warning or error reported back to the host alongside a result.
 */
export interface Diagnostic {
  severity: DiagnosticSeverity

  /**
   * Short label for the failing component.
   * @example 's3 client'
   */
  summary: string

  /**
   * Human-readable description with enough context to diagnose.
   * @example 'failed to get object: NoSuchKey'
   */
  detail: string
}

/**
 * Result of a lifecycle operation. `record` is absent when an error stopped it
 * before a record could be produced, and for delete.
 */
export interface OperationResult<T> {
  record?: T
  diagnostics: Diagnostic[]
}

/**
 * Lifecycle operations the host can invoke.
 */
export type LifecycleOperation = 'create' | 'read' | 'update' | 'delete' | 'import'

// =============================================================================
// Provider Configuration
// =============================================================================

/**
 * Web identity role assumption for the S3 client.
 */
export interface AssumeRoleWithWebIdentityConfig {
  /**
   * @example 'arn:aws:iam::111122223333:role/tfsync'
   */
  roleArn: string

  /**
   * @example '/var/run/secrets/tokens/aws-token'
   */
  webIdentityTokenFile: string
}

/**
 * Provider-wide configuration supplied once by the host.
 */
export interface ProviderConfig {
  /**
   * AWS region for the S3 client. Falls back to the SDK's own resolution.
   * @example 'eu-west-1'
   */
  region?: string

  /**
   * Custom S3 endpoint for S3-compatible stores.
   * @example 'http://localhost:9000'
   */
  endpoint?: string

  /**
   * Use path-style bucket addressing. Needed by most S3-compatible stores.
   */
  forcePathStyle?: boolean

  assumeRoleWithWebIdentity?: AssumeRoleWithWebIdentityConfig

  /**
   * Default soft-delete behaviour for every record.
   * @default false
   */
  softDelete?: boolean
}
