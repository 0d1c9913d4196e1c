/**
 * Object Store
 *
 * Reads, writes and deletes a single named object. Implementations throw
 * ObjectStoreError on transport failures and PutObjectValidationError when a
 * write is rejected before any network call.
 */

/**
 * Options for writing an object.
 */
export interface PutObjectOptions {
  bucket: string
  key: string

  /** Object body. Must not be empty. */
  contents: Uint8Array

  /**
   * Request server-side encryption with this KMS key when non-empty.
   * @example 'alias/tfsync'
   */
  kmsKeyId?: string

  /**
   * Tags attached to the object when non-empty.
   * @example { team: 'platform' }
   */
  tags?: Record<string, string>
}

export interface ObjectStore {
  /**
   * The store type this adapter handles.
   * @example 's3'
   */
  readonly type: string

  /**
   * Fetch and fully drain an object's contents.
   */
  getObject(bucket: string, key: string): Promise<Uint8Array>

  putObject(options: PutObjectOptions): Promise<void>

  /**
   * Delete an object. Deleting a missing object may or may not fail depending on the store.
   */
  deleteObject(bucket: string, key: string): Promise<void>
}

/**
 * Check write preconditions. Returns one message per problem; empty when valid.
 */
export function validatePutObjectOptions(options: PutObjectOptions): string[] {
  const issues: string[] = []
  if (options.bucket === '') {
    issues.push('empty bucket')
  }
  if (options.key === '') {
    issues.push('empty key')
  }
  if (options.contents.byteLength === 0) {
    issues.push('empty contents')
  }
  return issues
}
