/**
 * Terraform Cloud State Source
 *
 * Implements StateSource against the Terraform Cloud/Enterprise API: resolve the
 * workspace's current state version, then download the hosted state file.
 */

import type { WorkspaceId } from '@tfsync/core'
import { z } from 'zod'
import { DEFAULT_TFE_ADDRESS } from '../../config'
import {
  type FailureReason,
  StateSourceError,
  StateVersionNotFoundError,
  errorMessage,
  reasonFromStatus,
} from '../../errors'
import type { FetchStateOptions, FetchStateResult, StateSource } from '../state-source'

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

/**
 * Configuration for the TfeStateSource.
 */
export interface TfeStateSourceConfig {
  /**
   * API token sent as a bearer token on every request.
   */
  token: string

  /**
   * Base address of Terraform Cloud or a Terraform Enterprise install.
   * @default 'https://app.terraform.io'
   */
  address?: string

  /**
   * HTTP implementation.
   * @default globalThis.fetch
   */
  fetch?: FetchFn
}

// Same rule the Terraform Cloud client applies before calling the API
const WORKSPACE_ID_PATTERN = /^[a-zA-Z0-9\-._]+$/

const currentStateVersionSchema = z.object({
  data: z.object({
    id: z.string(),
    attributes: z.object({
      'hosted-state-download-url': z.string().nullable().optional(),
    }),
  }),
})

export class TfeStateSource implements StateSource {
  readonly type = 'tfe'

  private readonly address: string
  private readonly token: string
  private readonly fetch: FetchFn

  constructor(config: TfeStateSourceConfig) {
    this.address = (config.address ?? DEFAULT_TFE_ADDRESS).replace(/\/$/, '')
    this.token = config.token
    this.fetch = config.fetch ?? ((url, init) => fetch(url, init))
  }

  async fetchCurrentState(
    workspaceId: WorkspaceId,
    options: FetchStateOptions = {},
  ): Promise<FetchStateResult> {
    let downloadUrl: string
    try {
      downloadUrl = await this.readCurrentDownloadUrl(workspaceId)
    } catch (err) {
      if (options.ignoreEmpty && err instanceof StateVersionNotFoundError) {
        return { ignored: true }
      }
      throw err
    }

    const contents = await this.download(workspaceId, downloadUrl)
    return { ignored: false, contents }
  }

  /**
   * Resolve the download URL of the workspace's current state version.
   */
  async readCurrentDownloadUrl(workspaceId: WorkspaceId): Promise<string> {
    const operation = 'read current state version'
    if (!WORKSPACE_ID_PATTERN.test(workspaceId)) {
      throw new StateSourceError(operation, workspaceId, 'invalid value for workspace ID', {
        reason: 'invalid_request',
      })
    }

    const url = `${this.address}/api/v2/workspaces/${workspaceId}/current-state-version`
    const res = await this.request(operation, workspaceId, url, 'application/vnd.api+json')

    if (res.status === 404) {
      await res.body?.cancel()
      throw new StateVersionNotFoundError(workspaceId)
    }
    if (!res.ok) {
      throw await responseError(operation, workspaceId, res)
    }

    let body: unknown
    try {
      body = await res.json()
    } catch (err) {
      const message = `invalid JSON response: ${errorMessage(err)}`
      throw new StateSourceError(operation, workspaceId, message, {
        cause: err,
        reason: 'invalid_response',
      })
    }

    const parsed = currentStateVersionSchema.safeParse(body)
    if (!parsed.success) {
      throw new StateSourceError(operation, workspaceId, 'unexpected state version payload', {
        reason: 'invalid_response',
      })
    }

    const downloadUrl = parsed.data.data.attributes['hosted-state-download-url']
    if (!downloadUrl) {
      throw new StateSourceError(
        operation,
        workspaceId,
        `state version ${parsed.data.data.id} has no download url`,
        { reason: 'invalid_response' },
      )
    }
    return downloadUrl
  }

  /**
   * Download the raw state file.
   */
  async download(workspaceId: WorkspaceId, downloadUrl: string): Promise<Uint8Array> {
    const operation = 'download state'
    const res = await this.request(operation, workspaceId, downloadUrl, 'application/json')
    if (!res.ok) {
      throw await responseError(operation, workspaceId, res)
    }

    try {
      return new Uint8Array(await res.arrayBuffer())
    } catch (err) {
      throw new StateSourceError(operation, workspaceId, errorMessage(err), {
        cause: err,
        reason: 'network_error',
      })
    }
  }

  private async request(
    operation: StateSourceError['operation'],
    workspaceId: WorkspaceId,
    url: string,
    accept: string,
  ): Promise<Response> {
    try {
      return await this.fetch(url, {
        method: 'GET',
        headers: {
          Accept: accept,
          Authorization: `Bearer ${this.token}`,
        },
      })
    } catch (err) {
      throw new StateSourceError(operation, workspaceId, errorMessage(err), {
        cause: err,
        reason: transportReason(err),
      })
    }
  }
}

async function responseError(
  operation: StateSourceError['operation'],
  workspaceId: WorkspaceId,
  res: Response,
): Promise<StateSourceError> {
  const text = await res.text().catch(() => '')
  const status = `${res.status} ${res.statusText}`.trim()
  return new StateSourceError(operation, workspaceId, text ? `${status}: ${text}` : status, {
    reason: reasonFromStatus(res.status),
  })
}

// fetch rejects with a TypeError for network failures and with the abort reason on timeout
function transportReason(err: unknown): FailureReason {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return 'timeout'
  }
  return 'network_error'
}
