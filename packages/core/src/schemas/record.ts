import { z } from 'zod'
import type { ProviderConfig, SyncRecord } from '../types'

// Terraform sends null for unset optional attributes
const optionalString = z.string().nullable().optional()
const optionalBoolean = z.boolean().nullable().optional()

// =============================================================================
// Resource Record (tfsync_s3_object)
// =============================================================================

/**
 * Attributes of the `tfsync_s3_object` resource as the host sends them.
 * Field names match the Terraform schema (snake_case).
 */
const recordAttributes = {
  id: optionalString.describe('Derived identifier: {workspace_id}/{bucket}/{key}'),
  workspace_id: z.string().min(1).describe('Terraform workspace id'),
  bucket: z.string().min(1).describe('S3 bucket'),
  key: z.string().min(1).describe('S3 bucket key'),
  kms_key_id: optionalString.describe('KMS key id for server-side encryption'),
  ignore_empty: optionalBoolean.describe('Ignore if no state is found'),
  ignored: optionalBoolean.describe(
    'True if this was ignored due to no state file found and `ignore_empty` is enabled',
  ),
  soft_delete: optionalBoolean.describe('Keep the object when the resource is destroyed'),
  state_contents_sha256: optionalString.describe('sha256 sum of tf state'),
  bucket_contents_sha256: optionalString.describe('sha256 sum of s3 bucket object contents'),
  tags: z.record(z.string(), z.string()).nullable().optional().describe('Tags to apply to the object'),
}

/**
 * Raw host record schema (snake_case), used for planned records on create and update.
 */
export const hostRecordSchema = z.object(recordAttributes)

/**
 * Prior-state schema used on read and delete. After an import the host only knows
 * the id, so the location attributes may be missing or empty.
 */
export const hostStateSchema = z.object({
  ...recordAttributes,
  workspace_id: z.string().nullable().optional(),
  bucket: z.string().nullable().optional(),
  key: z.string().nullable().optional(),
})

export type HostRecordRaw = z.input<typeof hostStateSchema>

/**
 * Record returned to the host. Every attribute is present; unset ones are null.
 */
export interface HostRecord {
  id: string | null
  workspace_id: string
  bucket: string
  key: string
  kms_key_id: string | null
  ignore_empty: boolean | null
  ignored: boolean | null
  soft_delete: boolean | null
  state_contents_sha256: string | null
  bucket_contents_sha256: string | null
  tags: Record<string, string> | null
}

function fromHostRecord(raw: z.output<typeof hostStateSchema>): SyncRecord {
  return {
    id: raw.id ?? undefined,
    workspaceId: raw.workspace_id ?? '',
    bucket: raw.bucket ?? '',
    key: raw.key ?? '',
    kmsKeyId: raw.kms_key_id ?? undefined,
    ignoreEmpty: raw.ignore_empty ?? undefined,
    ignored: raw.ignored ?? undefined,
    softDelete: raw.soft_delete ?? undefined,
    stateContentsSha256: raw.state_contents_sha256 ?? null,
    bucketContentsSha256: raw.bucket_contents_sha256 ?? null,
    tags: raw.tags ?? undefined,
  }
}

/**
 * Convert a record back to the host's attribute names.
 */
export function toHostRecord(record: SyncRecord): HostRecord {
  return {
    id: record.id ?? null,
    workspace_id: record.workspaceId,
    bucket: record.bucket,
    key: record.key,
    kms_key_id: record.kmsKeyId ?? null,
    ignore_empty: record.ignoreEmpty ?? null,
    ignored: record.ignored ?? null,
    soft_delete: record.softDelete ?? null,
    state_contents_sha256: record.stateContentsSha256 ?? null,
    bucket_contents_sha256: record.bucketContentsSha256 ?? null,
    tags: record.tags ?? null,
  }
}

// =============================================================================
// Provider Configuration
// =============================================================================

/**
 * Provider block schema
 */
export const providerConfigSchema = z.object({
  region: optionalString.describe('aws region'),
  endpoint: optionalString.describe('Custom S3 endpoint (for S3-compatible services)'),
  force_path_style: optionalBoolean.describe('Use path-style bucket addressing'),
  assume_role_with_web_identity: z
    .object({
      role_arn: z.string().min(1).describe('role arn to assume'),
      web_identity_token_file: z.string().min(1).describe('path to web identity token file'),
    })
    .nullable()
    .optional()
    .describe('configure assume-role-with-web-identity for aws s3 client'),
  soft_delete: optionalBoolean.describe('Default soft_delete for every resource'),
})

export type ProviderConfigRaw = z.input<typeof providerConfigSchema>

function fromProviderConfig(raw: z.output<typeof providerConfigSchema>): ProviderConfig {
  const role = raw.assume_role_with_web_identity
  return {
    region: raw.region ?? undefined,
    endpoint: raw.endpoint ?? undefined,
    forcePathStyle: raw.force_path_style ?? undefined,
    assumeRoleWithWebIdentity: role
      ? { roleArn: role.role_arn, webIdentityTokenFile: role.web_identity_token_file }
      : undefined,
    softDelete: raw.soft_delete ?? undefined,
  }
}

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
}

/**
 * Safely parse a planned record (create, update). Location attributes are required.
 */
export function safeParseSyncRecord(data: unknown): ParseResult<SyncRecord> {
  const result = hostRecordSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: fromHostRecord(result.data) }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}

/**
 * Safely parse a prior-state record (read, delete).
 */
export function safeParseSyncState(data: unknown): ParseResult<SyncRecord> {
  const result = hostStateSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: fromHostRecord(result.data) }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}

/**
 * Safely parse the provider block. A null or undefined block is an empty configuration.
 */
export function safeParseProviderConfig(data: unknown): ParseResult<ProviderConfig> {
  const result = providerConfigSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: fromProviderConfig(result.data) }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}
