/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions and in-memory adapters for provider tests.
 */

import type { SyncRecord, WorkspaceId } from '@tfsync/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import { vi } from 'vitest'
import { ObjectStoreError, StateVersionNotFoundError } from '../lib/errors'
import type { FetchStateOptions, FetchStateResult, PutObjectOptions } from '../lib/sync'

export const silentLogger = pino({ level: 'silent' })

const encoder = new TextEncoder()

// =============================================================================
// ID Generators
// =============================================================================

export function createWorkspaceId(): WorkspaceId {
  return `ws-${faker.string.alphanumeric(16)}`
}

export function createBucketName(): string {
  return `state-${faker.string.alphanumeric(8).toLowerCase()}`
}

export function createObjectKey(): string {
  return `${faker.helpers.arrayElement(['prod', 'staging', 'dev'])}/${faker.word.noun()}.tfstate`
}

// =============================================================================
// Record Fixtures
// =============================================================================

export function createSyncRecord(overrides?: Partial<SyncRecord>): SyncRecord {
  return {
    workspaceId: createWorkspaceId(),
    bucket: createBucketName(),
    key: createObjectKey(),
    ...overrides,
  }
}

/**
 * Bytes of a plausible Terraform state file.
 */
export function createStateContents(serial = faker.number.int({ min: 1, max: 500 })): Uint8Array {
  const state = {
    version: 4,
    terraform_version: faker.system.semver(),
    serial,
    lineage: faker.string.uuid(),
    outputs: {},
    resources: [],
  }
  return encoder.encode(JSON.stringify(state))
}

// =============================================================================
// Fake Adapters
// =============================================================================

/**
 * StateSource that serves fixed contents. Without contents it behaves like a
 * workspace that has no current state version.
 */
export function createFakeStateSource(behaviour: { contents?: Uint8Array; error?: Error } = {}) {
  return {
    type: 'fake',
    fetchCurrentState: vi.fn(
      async (
        workspaceId: WorkspaceId,
        options: FetchStateOptions = {},
      ): Promise<FetchStateResult> => {
        if (behaviour.error) {
          throw behaviour.error
        }
        if (!behaviour.contents) {
          if (options.ignoreEmpty) {
            return { ignored: true }
          }
          throw new StateVersionNotFoundError(workspaceId)
        }
        return { ignored: false, contents: behaviour.contents }
      },
    ),
  }
}

/**
 * ObjectStore backed by a Map keyed by `{bucket}/{key}`.
 */
export function createFakeObjectStore(initial: Record<string, Uint8Array> = {}) {
  const objects = new Map<string, Uint8Array>(Object.entries(initial))

  return {
    type: 'fake',
    objects,
    getObject: vi.fn(async (bucket: string, key: string): Promise<Uint8Array> => {
      const contents = objects.get(`${bucket}/${key}`)
      if (!contents) {
        throw new ObjectStoreError('get object', bucket, key, 'NoSuchKey', {
          reason: 'not_found',
        })
      }
      return contents
    }),
    putObject: vi.fn(async (options: PutObjectOptions): Promise<void> => {
      objects.set(`${options.bucket}/${options.key}`, options.contents)
    }),
    deleteObject: vi.fn(async (bucket: string, key: string): Promise<void> => {
      objects.delete(`${bucket}/${key}`)
    }),
  }
}
