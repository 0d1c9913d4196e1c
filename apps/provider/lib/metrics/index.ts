/**
 * tfsync metrics, all registered on one registry under the tfsync_ prefix.
 */

export { providerInfo, recordProviderInfo, registry } from './registry'

export * from './sync'
