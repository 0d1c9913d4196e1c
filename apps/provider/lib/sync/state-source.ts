/**
 * State Source
 *
 * Reads the current state snapshot of a workspace from a remote versioned-state
 * service. Implementations throw StateVersionNotFoundError when the workspace has
 * no current state version and StateSourceError for any other failure.
 */

import type { WorkspaceId } from '@tfsync/core'

/**
 * Outcome of fetching the current state.
 * `ignored` is only ever true when the caller passed ignoreEmpty.
 */
export type FetchStateResult = { ignored: true } | { ignored: false; contents: Uint8Array }

export interface FetchStateOptions {
  /**
   * Report a missing current state version as `{ ignored: true }` instead of throwing.
   * @default false
   */
  ignoreEmpty?: boolean
}

export interface StateSource {
  /**
   * The service this source reads from.
   * @example 'tfe'
   */
  readonly type: string

  /**
   * Fetch the latest state snapshot for a workspace.
   */
  fetchCurrentState(
    workspaceId: WorkspaceId,
    options?: FetchStateOptions,
  ): Promise<FetchStateResult>
}
