/**
 * Metrics registry shared by every tfsync metric.
 */

import { Gauge, Registry, collectDefaultMetrics } from 'prom-client'
import { VERSION } from '../version'

export const registry = new Registry()

collectDefaultMetrics({ register: registry, prefix: 'tfsync_' })

export const providerInfo = new Gauge({
  name: 'tfsync_info',
  help: 'tfsync provider build, always 1',
  labelNames: ['version'],
  registers: [registry],
})

/**
 * Record the build info. Run again after `registry.resetMetrics()`.
 */
export function recordProviderInfo(): void {
  providerInfo.set({ version: VERSION }, 1)
}

recordProviderInfo()
