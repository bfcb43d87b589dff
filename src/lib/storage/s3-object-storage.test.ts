import {
  type BucketLocationConstraint,
  NoSuchBucket,
  NoSuchKey,
  S3ServiceException,
} from '@aws-sdk/client-s3'
import { describe, expect, it } from 'vitest'
import { testLogger } from '../../test-utils/logger'
import {
  createStubS3Client,
  listObjectsPage,
  type S3Request,
  type S3Responder,
  streamingBody,
} from '../../test-utils/stub-s3-client'
import {
  AuthError,
  ConnectivityError,
  NotFoundError,
  PermissionError,
  StorageServiceError,
  TimeoutError,
} from '../errors'
import { S3ObjectStorage, toStorageError } from './s3-object-storage'
import { StorageOperations } from './storage-operations'

function serviceException(name: string, httpStatusCode: number) {
  return new S3ServiceException({
    name,
    $fault: 'client',
    $metadata: { httpStatusCode },
    message: `${name} raised`,
  })
}

describe('toStorageError', () => {
  it('maps NoSuchKey to a NotFoundError naming the object', () => {
    const error = toStorageError(
      new NoSuchKey({ message: 'The specified key does not exist.', $metadata: {} }),
      { operation: 'GetObject', bucket: 'acme-docs', key: 'q1.pdf' }
    )

    expect(error).toBeInstanceOf(NotFoundError)
    expect(error.message).toBe('Object not found: s3://acme-docs/q1.pdf')
  })

  it('maps NoSuchBucket to a NotFoundError naming the bucket', () => {
    const error = toStorageError(
      new NoSuchBucket({ message: 'The specified bucket does not exist', $metadata: {} }),
      { operation: 'ListObjectsV2', bucket: 'missing' }
    )

    expect(error).toBeInstanceOf(NotFoundError)
    expect(error.message).toBe('Bucket missing does not exist')
  })

  it('treats a bare 404 on HeadObject as a missing object', () => {
    const error = toStorageError(serviceException('NotFound', 404), {
      operation: 'HeadObject',
      bucket: 'acme-docs',
      key: 'gone.txt',
    })

    expect(error).toBeInstanceOf(NotFoundError)
    expect(error.message).toBe('Object not found: s3://acme-docs/gone.txt')
  })

  it('maps AccessDenied to a PermissionError', () => {
    const error = toStorageError(serviceException('AccessDenied', 403), {
      operation: 'PutObject',
      bucket: 'acme-docs',
      key: 'a.txt',
    })

    expect(error).toBeInstanceOf(PermissionError)
    expect(error.message).toBe(
      'Access denied for s3://acme-docs/a.txt during PutObject'
    )
  })

  it('maps rejected credentials to an AuthError', () => {
    const error = toStorageError(serviceException('InvalidAccessKeyId', 403), {
      operation: 'ListBuckets',
    })

    expect(error).toBeInstanceOf(AuthError)
    expect(error.type).toBe('AuthError')
  })

  it('maps socket failures to a ConnectivityError', () => {
    const socketError = Object.assign(new Error('connect ECONNREFUSED'), {
      code: 'ECONNREFUSED',
    })

    const error = toStorageError(socketError, { operation: 'ListBuckets' })

    expect(error).toBeInstanceOf(ConnectivityError)
    expect(error.message).toBe(
      'Could not reach S3 during ListBuckets: connect ECONNREFUSED'
    )
  })

  it('maps SDK timeouts to a TimeoutError', () => {
    const timeout = new Error('Connection timed out after 5000 ms')
    timeout.name = 'TimeoutError'

    const error = toStorageError(timeout, { operation: 'ListBuckets' })

    expect(error).toBeInstanceOf(TimeoutError)
    expect(error.message).toBe('ListBuckets on S3 timed out')
  })

  it('falls back to a StorageServiceError', () => {
    const error = toStorageError(serviceException('SlowDown', 503), {
      operation: 'PutObject',
      bucket: 'acme-docs',
    })

    expect(error).toBeInstanceOf(StorageServiceError)
    expect(error.message).toBe(
      'PutObject failed for bucket acme-docs: SlowDown raised'
    )
  })

  it('passes through errors that are already mapped', () => {
    const original = new NotFoundError('Local file x does not exist')

    expect(toStorageError(original, { operation: 'PutObject' })).toBe(original)
  })
})

function keys(count: number): string[] {
  return Array.from(
    { length: count },
    (_, index) => `k/${String(index).padStart(4, '0')}.log`
  )
}

function maxKeysOf({ input }: S3Request) {
  return 'MaxKeys' in input ? input.MaxKeys : undefined
}

function continuationTokenOf({ input }: S3Request) {
  return 'ContinuationToken' in input ? input.ContinuationToken : undefined
}

function rangeOf({ input }: S3Request) {
  return 'Range' in input ? input.Range : undefined
}

function createStorage(respond: S3Responder) {
  const { client, requests } = createStubS3Client(respond)
  return { storage: new S3ObjectStorage(client, testLogger), requests }
}

describe('S3ObjectStorage', () => {
  describe('listObjects', () => {
    const bucketKeys = keys(1500)
    const listing = () =>
      createStorage(({ input }) => listObjectsPage(bucketKeys, input))

    it('stops after the default limit', async () => {
      const { storage, requests } = listing()

      const objects = await storage.listObjects('acme-logs')

      expect(objects).toHaveLength(1000)
      expect(requests.map(maxKeysOf)).toEqual([1000])
    })

    it('follows continuation tokens up to maxKeys', async () => {
      const { storage, requests } = listing()

      const objects = await storage.listObjects('acme-logs', { maxKeys: 1200 })

      expect(objects).toHaveLength(1200)
      expect(objects[1199]?.key).toBe('k/1199.log')
      expect(requests.map(maxKeysOf)).toEqual([1000, 200])
      expect(requests.map(continuationTokenOf)).toEqual([undefined, '1000'])
    })

    it('reads every page when asked for all keys', async () => {
      const { storage, requests } = listing()

      const objects = await storage.listObjects('acme-logs', {
        all: true,
        maxKeys: 10,
      })

      expect(objects).toHaveLength(1500)
      expect(requests).toHaveLength(2)
    })

    it('lets search find a key on the second page', async () => {
      const searchKeys = keys(1500)
      searchKeys[1400] = 'k/zz-report.pdf'
      const { storage } = createStorage(({ commandName, input }) =>
        commandName === 'HeadObjectCommand'
          ? { $metadata: {}, ContentLength: 1, Metadata: {} }
          : listObjectsPage(searchKeys, input)
      )
      const operations = new StorageOperations(storage, testLogger)

      const matches = await operations.search('report', 'acme-logs')

      expect(matches.map(({ key }) => key)).toEqual(['k/zz-report.pdf'])
    })
  })

  it('follows ListBuckets continuation tokens', async () => {
    const { storage, requests } = createStorage((request) =>
      continuationTokenOf(request) === 'page-2'
        ? { $metadata: {}, Buckets: [{ Name: 'acme-logs' }] }
        : {
            $metadata: {},
            Buckets: [{ Name: 'acme-docs', BucketRegion: 'eu-west-1' }],
            ContinuationToken: 'page-2',
          }
    )

    const buckets = await storage.listBuckets()

    expect(buckets.map(({ name }) => name)).toEqual(['acme-docs', 'acme-logs'])
    expect(buckets[0]?.region).toBe('eu-west-1')
    expect(requests.map(continuationTokenOf)).toEqual([undefined, 'page-2'])
  })

  describe('getObject', () => {
    it('requests a byte range when the object is larger than maxBytes', async () => {
      const { storage, requests } = createStorage(({ commandName }) =>
        commandName === 'HeadObjectCommand'
          ? { $metadata: {}, ContentLength: 10, ContentType: 'text/plain' }
          : {
              $metadata: {},
              Body: streamingBody('abcd'),
              ContentRange: 'bytes 0-3/10',
            }
      )

      const content = await storage.getObject('acme-docs', 'notes.txt', {
        maxBytes: 4,
      })

      expect(requests.map(({ commandName }) => commandName)).toEqual([
        'HeadObjectCommand',
        'GetObjectCommand',
      ])
      expect(requests.map(rangeOf)).toEqual([undefined, 'bytes=0-3'])
      expect(new TextDecoder().decode(content.body)).toBe('abcd')
      expect(content.metadata.size).toBe(10)
      expect(content.truncated).toBe(true)
    })

    it('reads the whole object when it fits', async () => {
      const { storage, requests } = createStorage(({ commandName }) =>
        commandName === 'HeadObjectCommand'
          ? { $metadata: {}, ContentLength: 3 }
          : { $metadata: {}, Body: streamingBody('abc') }
      )

      const content = await storage.getObject('acme-docs', 'short.txt', {
        maxBytes: 4,
      })

      expect(requests.map(rangeOf)).toEqual([undefined, undefined])
      expect(content.metadata.size).toBe(3)
      expect(content.truncated).toBe(false)
    })
  })

  describe('getBucketRegion', () => {
    it.each<[BucketLocationConstraint | undefined, string]>([
      [undefined, 'us-east-1'],
      ['EU', 'eu-west-1'],
      ['ap-south-1', 'ap-south-1'],
    ])('maps constraint %s to %s', async (constraint, region) => {
      const { storage } = createStorage(() => ({
        $metadata: {},
        LocationConstraint: constraint,
      }))

      await expect(storage.getBucketRegion('acme-docs')).resolves.toBe(region)
    })
  })
})
