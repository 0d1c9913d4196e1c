/**
 * S3ObjectResource Unit Tests
 */

import { describe, expect, test } from 'vitest'
import {
  createFakeObjectStore,
  createFakeStateSource,
  createStateContents,
  silentLogger,
} from '../../test/fixtures'
import { StateObjectSynchronizer, sha256Hex } from '../sync'
import { S3ObjectResource, requiresReplace } from './s3-object'

const PLAN = {
  workspace_id: 'ws-abc123',
  bucket: 'state-mirror',
  key: 'prod/network.tfstate',
  tags: { team: 'platform' },
}
const ID = 'ws-abc123/state-mirror/prod/network.tfstate'

function createResource(contents = createStateContents()) {
  const stateSource = createFakeStateSource({ contents })
  const objectStore = createFakeObjectStore()
  const resource = new S3ObjectResource()
  resource.configure(
    new StateObjectSynchronizer({ stateSource, objectStore, logger: silentLogger }),
  )
  return { resource, stateSource, objectStore }
}

describe('S3ObjectResource', () => {
  test('is the tfsync_s3_object resource', () => {
    expect(new S3ObjectResource().typeName).toBe('tfsync_s3_object')
  })

  describe('before configure', () => {
    const resource = new S3ObjectResource()
    const notConfigured = [{ severity: 'error', summary: 'provider', detail: 'nil synchronizer' }]

    test('every handler reports the missing synchronizer', async () => {
      expect(await resource.create(PLAN)).toEqual({ diagnostics: notConfigured })
      expect(await resource.read(PLAN)).toEqual({ diagnostics: notConfigured })
      expect(await resource.update(PLAN)).toEqual({ diagnostics: notConfigured })
      expect(await resource.delete(PLAN)).toEqual({ diagnostics: notConfigured })
      expect(resource.importState(ID)).toEqual({ diagnostics: notConfigured })
    })
  })

  test('create returns the host record with every attribute', async () => {
    const contents = createStateContents(12)
    const { resource } = createResource(contents)
    const digest = sha256Hex(contents)

    const result = await resource.create(PLAN)

    expect(result).toEqual({
      state: {
        id: ID,
        workspace_id: 'ws-abc123',
        bucket: 'state-mirror',
        key: 'prod/network.tfstate',
        kms_key_id: null,
        ignore_empty: null,
        ignored: false,
        soft_delete: null,
        state_contents_sha256: digest,
        bucket_contents_sha256: digest,
        tags: { team: 'platform' },
      },
      diagnostics: [],
    })
  })

  test('invalid plans never reach the adapters', async () => {
    const { resource, stateSource } = createResource()

    const result = await resource.create({ workspace_id: 'ws-abc123', key: 'prod.tfstate' })

    expect(result).toEqual({
      diagnostics: [
        { severity: 'error', summary: 'invalid resource data', detail: 'bucket: Required' },
      ],
    })
    expect(stateSource.fetchCurrentState).not.toHaveBeenCalled()
  })

  test('import then read fills the location from the id', async () => {
    const contents = createStateContents(4)
    const { resource, objectStore } = createResource(contents)
    objectStore.objects.set('state-mirror/prod/network.tfstate', contents)

    const imported = resource.importState(ID)
    expect(imported).toEqual({ state: { id: ID }, diagnostics: [] })

    const result = await resource.read(imported.state)

    expect(result.diagnostics).toEqual([])
    expect(result.state).toMatchObject({
      id: ID,
      workspace_id: 'ws-abc123',
      bucket: 'state-mirror',
      key: 'prod/network.tfstate',
      state_contents_sha256: sha256Hex(contents),
      bucket_contents_sha256: sha256Hex(contents),
    })
  })

  test('delete returns no state', async () => {
    const { resource, objectStore } = createResource()
    objectStore.objects.set('state-mirror/prod/network.tfstate', new Uint8Array([1]))

    const result = await resource.delete({ ...PLAN, id: ID })

    expect(result).toEqual({ state: undefined, diagnostics: [] })
    expect(objectStore.objects.size).toBe(0)
  })
})

describe('requiresReplace', () => {
  test('a changed workspace forces a replace', () => {
    expect(requiresReplace({ workspace_id: 'ws-a' }, { workspace_id: 'ws-b' })).toBe(true)
  })

  test('the same workspace updates in place', () => {
    expect(requiresReplace({ workspace_id: 'ws-a' }, { workspace_id: 'ws-a' })).toBe(false)
  })

  test('an imported record has no workspace to compare', () => {
    expect(requiresReplace({ workspace_id: '' }, { workspace_id: 'ws-a' })).toBe(false)
  })
})
