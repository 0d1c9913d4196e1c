/**
 * Provider Configuration
 *
 * Runs once per host session: validates the provider block, builds the Terraform
 * Cloud and S3 clients and wires them into the resource.
 */

import type { S3Client } from '@aws-sdk/client-s3'
import { type Diagnostic, safeParseProviderConfig } from '@tfsync/core'
import { loadConfig } from './config'
import { Diagnostics } from './diagnostics'
import { type Logger, createLogger } from './logger'
import { S3ObjectResource } from './resource'
import {
  type FetchFn,
  S3ObjectStore,
  StateObjectSynchronizer,
  TfeStateSource,
  createS3Client,
} from './sync'

export const PROVIDER_TYPE_NAME = 'tfsync'

export interface ConfigureOptions {
  /** @default process.env */
  env?: NodeJS.ProcessEnv

  /** Defaults to a logger at TFSYNC_LOG_LEVEL. */
  logger?: Logger

  /** HTTP implementation for the Terraform Cloud client. */
  fetch?: FetchFn

  /** Use this S3 client instead of building one from the provider block. */
  s3Client?: S3Client
}

export interface ConfiguredProvider {
  /**
   * Always present. Unconfigured when `diagnostics` holds an error.
   */
  resource: S3ObjectResource
  synchronizer?: StateObjectSynchronizer
  diagnostics: Diagnostic[]
}

export function configureProvider(
  input: unknown,
  options: ConfigureOptions = {},
): ConfiguredProvider {
  const env = loadConfig(options.env)
  const logger = options.logger ?? createLogger(env.logLevel)
  const log = logger.child({ component: 'Provider' })
  const resource = new S3ObjectResource()
  const diags = new Diagnostics()

  log.info('Configuring tfsync provider')

  const parsed = safeParseProviderConfig(input)
  if (!parsed.success) {
    for (const error of parsed.errors) {
      diags.addError('invalid provider configuration', `${error.path}: ${error.message}`)
    }
    return { resource, diagnostics: diags.toArray() }
  }

  if (!env.tfeToken) {
    diags.addError('tfe client', 'failed to create tfe client: missing API token, set TFE_TOKEN')
    return { resource, diagnostics: diags.toArray() }
  }

  const config = { ...parsed.data, region: parsed.data.region ?? env.awsRegion }
  const s3Client = options.s3Client ?? createS3Client(config)

  const synchronizer = new StateObjectSynchronizer({
    stateSource: new TfeStateSource({
      address: env.tfeAddress,
      token: env.tfeToken,
      fetch: options.fetch,
    }),
    objectStore: new S3ObjectStore(s3Client, logger),
    softDelete: config.softDelete ?? env.softDelete,
    logger,
  })
  resource.configure(synchronizer)

  log.info({ aws_region: config.region, tfe_address: env.tfeAddress }, 'Configured tfsync client')

  return { resource, synchronizer, diagnostics: diags.toArray() }
}
