/**
 * Environment configuration
 *
 * Terraform Cloud address and token follow the same variables the Terraform
 * Cloud client reads. Provider-block settings arrive separately from the host.
 */

export const DEFAULT_TFE_ADDRESS = 'https://app.terraform.io'

export interface EnvConfig {
  /**
   * Terraform Cloud/Enterprise base address.
   * @example 'https://app.terraform.io'
   */
  tfeAddress: string

  /** API token; undefined when TFE_TOKEN is unset. */
  tfeToken?: string

  /**
   * Region used when the provider block does not set one.
   * @example 'eu-west-1'
   */
  awsRegion?: string

  /**
   * Provider-wide soft-delete default applied when the block does not set one.
   * @default false
   */
  softDelete: boolean

  /** @default 'info' */
  logLevel: string
}

function getEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]
  return value === undefined || value === '' ? undefined : value
}

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const value = getEnvString(env, key)
  if (value === undefined) return defaultValue
  return ['1', 'true', 'yes'].includes(value.toLowerCase())
}

function resolveTfeAddress(env: NodeJS.ProcessEnv): string {
  const address = getEnvString(env, 'TFE_ADDRESS')
  if (address) return address.replace(/\/$/, '')

  const hostname = getEnvString(env, 'TFE_HOSTNAME')
  if (hostname) return `https://${hostname}`

  return DEFAULT_TFE_ADDRESS
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    tfeAddress: resolveTfeAddress(env),
    tfeToken: getEnvString(env, 'TFE_TOKEN'),
    awsRegion: getEnvString(env, 'AWS_REGION') ?? getEnvString(env, 'AWS_DEFAULT_REGION'),
    softDelete: getEnvBoolean(env, 'TFSYNC_SOFT_DELETE', false),
    logLevel: getEnvString(env, 'TFSYNC_LOG_LEVEL') ?? 'info',
  }
}
