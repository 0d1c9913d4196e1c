/**
 * Option parsing shared by the tfsync commands.
 */

import type { HostRecord, ProviderConfigRaw } from '@tfsync/core'
import { InvalidArgumentError } from 'commander'

export interface GlobalOptions {
  region?: string
  endpoint?: string
  forcePathStyle?: boolean
  roleArn?: string
  webIdentityTokenFile?: string
  softDelete?: boolean
}

export interface CommandResult {
  state?: Pick<HostRecord, 'state_contents_sha256' | 'bucket_contents_sha256'> | null
  diagnostics: { severity: string }[]
}

/**
 * Commander argParser for a repeatable `--tag key=value`.
 */
export function collectTag(value: string, previous: Record<string, string> = {}) {
  const separator = value.indexOf('=')
  if (separator <= 0) {
    throw new InvalidArgumentError(`expected key=value, got "${value}"`)
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) }
}

/**
 * Provider block built from the global flags.
 */
export function toProviderBlock(options: GlobalOptions): ProviderConfigRaw {
  const block: ProviderConfigRaw = {
    region: options.region,
    endpoint: options.endpoint,
    force_path_style: options.forcePathStyle,
    soft_delete: options.softDelete,
  }

  if (options.roleArn || options.webIdentityTokenFile) {
    block.assume_role_with_web_identity = {
      role_arn: options.roleArn ?? '',
      web_identity_token_file: options.webIdentityTokenFile ?? '',
    }
  }
  return block
}

export function hasDrift(result: CommandResult): boolean {
  const state = result.state
  if (!state?.state_contents_sha256 || !state.bucket_contents_sha256) {
    return false
  }
  return state.state_contents_sha256 !== state.bucket_contents_sha256
}

/**
 * 1 on any error diagnostic, 2 on drift when asked to fail on it, otherwise 0.
 */
export function exitCodeFor(result: CommandResult, failOnDrift = false): number {
  if (result.diagnostics.some((d) => d.severity === 'error')) return 1
  if (failOnDrift && hasDrift(result)) return 2
  return 0
}
