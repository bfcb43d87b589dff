import { RuntimeContext } from '@mastra/core/runtime-context'
import { describe, expect, it } from 'vitest'
import { InMemoryObjectStorage } from '../../test-utils/in-memory-object-storage'
import { testLogger } from '../../test-utils/logger'
import { StorageOperations } from '../storage/storage-operations'
import {
  createStorageRuntimeContext,
  getDownloadDir,
  getStorageOperations,
} from './runtime-context'
import { getBucketLocationTool } from './s3/get-bucket-location-tool'

describe('storage runtime context', () => {
  const operations = new StorageOperations(
    new InMemoryObjectStorage().createBucket('acme-docs', 'eu-west-1'),
    testLogger
  )

  it('carries the operations and download directory', () => {
    const runtimeContext = createStorageRuntimeContext(operations, '/tmp/downloads')

    expect(getStorageOperations(runtimeContext)).toBe(operations)
    expect(getDownloadDir(runtimeContext)).toBe('/tmp/downloads')
  })

  it('rejects a context without storage operations', () => {
    const runtimeContext = new RuntimeContext()

    expect(() => getStorageOperations(runtimeContext)).toThrow(
      'Storage tools need StorageOperations in the runtime context'
    )
    expect(() => getDownloadDir(runtimeContext)).toThrow(
      'Storage tools need a download directory in the runtime context'
    )
  })

  it('is what a Mastra tool reads its dependencies from', async () => {
    expect(getBucketLocationTool.id).toBe('get_bucket_location')

    const result = await getBucketLocationTool.execute?.({
      context: { bucket: 'acme-docs' },
      runtimeContext: createStorageRuntimeContext(operations, '/tmp/downloads'),
    })

    expect(result).toEqual({ bucket: 'acme-docs', region: 'eu-west-1' })
  })
})
