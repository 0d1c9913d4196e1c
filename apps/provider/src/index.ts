/**
 * @tfsync/provider
 *
 * The tfsync provider: mirrors Terraform Cloud workspace state into S3 objects.
 * The host calls configureProvider once, then drives the returned resource.
 */

export {
  type ConfigureOptions,
  type ConfiguredProvider,
  PROVIDER_TYPE_NAME,
  configureProvider,
} from '../lib/provider'
export {
  type ResourceResult,
  S3ObjectResource,
  S3_OBJECT_RESOURCE_TYPE,
  requiresReplace,
} from '../lib/resource'
export * from '../lib/sync'
export { Diagnostics, diagnosticsFromError } from '../lib/diagnostics'
export * from '../lib/errors'
export { type EnvConfig, loadConfig } from '../lib/config'
export { type Logger, createLogger } from '../lib/logger'
export { registry } from '../lib/metrics'
export { VERSION } from '../lib/version'
