/**
 * Resource Identifier
 *
 * `{workspaceId}/{bucket}/{key}`. Workspace ids and bucket names never contain a
 * slash, so everything after the second separator belongs to the key.
 */

import type { ResourceId, WorkspaceId } from '@tfsync/core'

export interface ResourceLocation {
  workspaceId: WorkspaceId
  bucket: string
  key: string
}

export function buildResourceId(location: ResourceLocation): ResourceId {
  return `${location.workspaceId}/${location.bucket}/${location.key}`
}

/**
 * Recover the location from an identifier, e.g. one supplied on import.
 * Returns undefined when any component is missing.
 */
export function parseResourceId(id: ResourceId): ResourceLocation | undefined {
  const [workspaceId, bucket, ...rest] = id.split('/')
  const key = rest.join('/')

  if (!workspaceId || !bucket || !key) {
    return undefined
  }
  return { workspaceId, bucket, key }
}
