/**
 * Sync Module
 *
 * Mirrors Terraform workspace state into object storage and reports digests of
 * both sides so drift shows up on read.
 */

// Content digest and identifiers
export { sha256Hex } from './digest'
export { type ResourceLocation, buildResourceId, parseResourceId } from './resource-id'
export { encodeTags } from './tags'

// Where state comes from
export type { FetchStateOptions, FetchStateResult, StateSource } from './state-source'
export { type FetchFn, TfeStateSource, type TfeStateSourceConfig } from './state-sources'

// Where state goes
export { type ObjectStore, type PutObjectOptions, validatePutObjectOptions } from './object-store'
export { S3ObjectStore, createS3Client, s3ClientConfig, s3FailureReason } from './object-stores'

// Lifecycle orchestration
export { StateObjectSynchronizer, type SynchronizerConfig } from './synchronizer'
