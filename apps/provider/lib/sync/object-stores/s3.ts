/**
 * S3 Object Store
 *
 * Implements ObjectStore for Amazon S3 and S3-compatible services.
 */

import {
  ChecksumAlgorithm,
  DeleteObjectCommand,
  GetObjectCommand,
  type GetObjectCommandOutput,
  PutObjectCommand,
  type PutObjectCommandInput,
  S3Client,
  type S3ClientConfig,
  S3ServiceException,
  ServerSideEncryption,
} from '@aws-sdk/client-s3'
import { fromTokenFile } from '@aws-sdk/credential-providers'
import type { ProviderConfig } from '@tfsync/core'
import {
  type FailureReason,
  ObjectStoreError,
  PutObjectValidationError,
  errorMessage,
  reasonFromStatus,
} from '../../errors'
import type { Logger } from '../../logger'
import { type ObjectStore, type PutObjectOptions, validatePutObjectOptions } from '../object-store'
import { encodeTags } from '../tags'

// Terraform state files are JSON
const STATE_CONTENT_TYPE = 'application/json'

// S3 error codes that mean the caller lacks access
const PERMISSION_ERRORS = new Set([
  'AccessDenied',
  'AllAccessDisabled',
  'ExpiredToken',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
])
const NOT_FOUND_ERRORS = new Set(['NoSuchBucket', 'NoSuchKey', 'NotFound'])
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
])

/**
 * S3 client settings from the provider block. Credentials come from the SDK's
 * default chain unless a web identity role is configured.
 */
export function s3ClientConfig(config: ProviderConfig): S3ClientConfig {
  const role = config.assumeRoleWithWebIdentity

  return {
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: role
      ? fromTokenFile({
          roleArn: role.roleArn,
          webIdentityTokenFile: role.webIdentityTokenFile,
          clientConfig: { region: config.region },
        })
      : undefined,
  }
}

export function createS3Client(config: ProviderConfig): S3Client {
  return new S3Client(s3ClientConfig(config))
}

/**
 * Failure reason of an S3 SDK error: the service error code first, then the HTTP
 * status, then the socket error code.
 */
export function s3FailureReason(err: unknown): FailureReason {
  if (err instanceof S3ServiceException) {
    if (PERMISSION_ERRORS.has(err.name)) return 'permission_denied'
    if (NOT_FOUND_ERRORS.has(err.name)) return 'not_found'
    return reasonFromStatus(err.$metadata.httpStatusCode)
  }
  if (!(err instanceof Error)) return 'unknown'
  if (err.name === 'TimeoutError') return 'timeout'
  if ('code' in err && typeof err.code === 'string' && NETWORK_ERROR_CODES.has(err.code)) {
    return 'network_error'
  }
  return 'unknown'
}

function storeError(
  operation: ObjectStoreError['operation'],
  bucket: string,
  key: string,
  err: unknown,
): ObjectStoreError {
  return new ObjectStoreError(operation, bucket, key, errorMessage(err), {
    cause: err,
    reason: s3FailureReason(err),
  })
}

export class S3ObjectStore implements ObjectStore {
  readonly type = 's3'

  private readonly client: S3Client
  private readonly log: Logger

  constructor(client: S3Client, logger: Logger) {
    this.client = client
    this.log = logger.child({ component: 'S3ObjectStore' })
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    let response: GetObjectCommandOutput
    try {
      response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }))
    } catch (err) {
      throw storeError('get object', bucket, key, err)
    }

    if (!response.Body) {
      return new Uint8Array(0)
    }

    try {
      return await response.Body.transformToByteArray()
    } catch (err) {
      throw storeError('read body', bucket, key, err)
    }
  }

  async putObject(options: PutObjectOptions): Promise<void> {
    const issues = validatePutObjectOptions(options)
    if (issues.length > 0) {
      throw new PutObjectValidationError(issues)
    }

    const { bucket, key, contents, kmsKeyId, tags } = options
    this.log.debug({ bucket, key, bytes: contents.byteLength }, 'tfsync putobject')

    const input: PutObjectCommandInput = {
      Bucket: bucket,
      Key: key,
      Body: contents,
      ContentLength: contents.byteLength,
      ContentType: STATE_CONTENT_TYPE,
      ChecksumAlgorithm: ChecksumAlgorithm.SHA256,
    }

    if (kmsKeyId) {
      input.ServerSideEncryption = ServerSideEncryption.aws_kms
      input.SSEKMSKeyId = kmsKeyId
    }

    if (tags && Object.keys(tags).length > 0) {
      input.Tagging = encodeTags(tags)
    }

    try {
      await this.client.send(new PutObjectCommand(input))
    } catch (err) {
      throw storeError('put object', bucket, key, err)
    }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }))
    } catch (err) {
      throw storeError('delete object', bucket, key, err)
    }
  }
}
