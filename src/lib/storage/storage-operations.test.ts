import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { InvalidArgumentsError, NotFoundError } from '../errors'
import { InMemoryObjectStorage } from '../../test-utils/in-memory-object-storage'
import { testLogger } from '../../test-utils/logger'
import { StorageOperations } from './storage-operations'

describe('StorageOperations', () => {
  let storage: InMemoryObjectStorage
  let operations: StorageOperations
  let workDir: string

  beforeEach(async () => {
    storage = new InMemoryObjectStorage()
      .createBucket('acme-docs', 'eu-west-1')
      .createBucket('acme-logs')
    operations = new StorageOperations(storage, testLogger)
    workDir = await mkdtemp(path.join(os.tmpdir(), 'storage-ops-'))
  })

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  describe('listBuckets', () => {
    it('returns every bucket with its region', async () => {
      const buckets = await operations.listBuckets()

      expect(buckets.map((bucket) => [bucket.name, bucket.region])).toEqual([
        ['acme-docs', 'eu-west-1'],
        ['acme-logs', 'us-east-1'],
      ])
    })
  })

  describe('listObjects', () => {
    it('returns exactly the keys present, whatever order they were written in', async () => {
      storage
        .seed('acme-docs', 'reports/q2.pdf', 'q2')
        .seed('acme-docs', 'images/logo.png', 'png')
        .seed('acme-docs', 'reports/q1.pdf', 'q1')

      const objects = await operations.listObjects('acme-docs')

      expect(objects.map((object) => object.key)).toEqual([
        'images/logo.png',
        'reports/q1.pdf',
        'reports/q2.pdf',
      ])
    })

    it('filters by prefix', async () => {
      storage
        .seed('acme-docs', 'reports/q1.pdf', 'q1')
        .seed('acme-docs', 'images/logo.png', 'png')

      const objects = await operations.listObjects('acme-docs', 'reports/')

      expect(objects.map((object) => object.key)).toEqual(['reports/q1.pdf'])
    })

    it('fails with NotFoundError for a missing bucket', async () => {
      await expect(operations.listObjects('missing')).rejects.toBeInstanceOf(
        NotFoundError
      )
    })
  })

  describe('upload and download', () => {
    it('round-trips identical bytes', async () => {
      const source = path.join(workDir, 'report.bin')
      const bytes = Uint8Array.from([0, 1, 2, 250, 255, 10, 13])
      await writeFile(source, bytes)

      const uploaded = await operations.upload('acme-docs', source)
      const target = path.join(workDir, 'out', 'copy.bin')
      const downloaded = await operations.download(
        'acme-docs',
        uploaded.key,
        target
      )

      expect(uploaded).toMatchObject({
        bucket: 'acme-docs',
        key: 'report.bin',
        size: 7,
      })
      expect(downloaded.bytesWritten).toBe(7)
      expect(new Uint8Array(await readFile(target))).toEqual(bytes)
    })

    it('uses the explicit key and stores content type and metadata', async () => {
      const source = path.join(workDir, 'notes.txt')
      await writeFile(source, 'hello')

      await operations.upload('acme-docs', source, 'notes/today.txt', {
        contentType: 'text/plain',
        metadata: { project: 'apollo' },
      })

      const metadata = await operations.getMetadata(
        'acme-docs',
        'notes/today.txt'
      )
      expect(metadata).toMatchObject({
        key: 'notes/today.txt',
        size: 5,
        contentType: 'text/plain',
        metadata: { project: 'apollo' },
      })
    })

    it('fails with NotFoundError when the local file is missing', async () => {
      await expect(
        operations.upload('acme-docs', path.join(workDir, 'nope.txt'))
      ).rejects.toBeInstanceOf(NotFoundError)
      expect(storage.calls).not.toContain('putObject:acme-docs/nope.txt')
    })

    it('rejects a directory as the upload source', async () => {
      await expect(
        operations.upload('acme-docs', workDir)
      ).rejects.toBeInstanceOf(InvalidArgumentsError)
    })

    it('fails with NotFoundError when downloading a missing object', async () => {
      await expect(
        operations.download(
          'acme-docs',
          'ghost.txt',
          path.join(workDir, 'ghost.txt')
        )
      ).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('delete', () => {
    it('makes a later getMetadata fail with NotFoundError', async () => {
      storage.seed('acme-docs', 'old.txt', 'stale')

      await expect(operations.delete('acme-docs', 'old.txt')).resolves.toEqual({
        bucket: 'acme-docs',
        key: 'old.txt',
        deleted: true,
      })
      await expect(
        operations.getMetadata('acme-docs', 'old.txt')
      ).rejects.toBeInstanceOf(NotFoundError)
    })

    it('fails with NotFoundError for a key that does not exist', async () => {
      await expect(
        operations.delete('acme-docs', 'never-existed.txt')
      ).rejects.toBeInstanceOf(NotFoundError)
      expect(storage.calls).not.toContain(
        'deleteObject:acme-docs/never-existed.txt'
      )
    })
  })

  describe('search', () => {
    beforeEach(() => {
      storage
        .seed('acme-docs', 'Finance/Annual-REPORT-2023.pdf', 'a')
        .seed('acme-docs', 'scan-0001.pdf', 'b', {
          metadata: { title: 'Quarterly Report' },
        })
        .seed('acme-docs', 'scan-0002.pdf', 'c', {
          metadata: { title: 'Invoice' },
        })
        .seed('acme-logs', 'reports/app.log', 'd')
    })

    it('matches keys and metadata case-insensitively within a bucket', async () => {
      const matches = await operations.search('report', 'acme-docs')

      expect(matches.map(({ key, matchedOn }) => [key, matchedOn])).toEqual([
        ['Finance/Annual-REPORT-2023.pdf', 'key'],
        ['scan-0001.pdf', 'metadata'],
      ])
    })

    it('searches every bucket when none is given', async () => {
      const matches = await operations.search('REPORT')

      expect(matches.map(({ bucket, key }) => `${bucket}/${key}`)).toEqual([
        'acme-docs/Finance/Annual-REPORT-2023.pdf',
        'acme-docs/scan-0001.pdf',
        'acme-logs/reports/app.log',
      ])
    })

    it('searches past the default listing limit', async () => {
      for (let index = 0; index < 1000; index += 1) {
        storage.seed('acme-logs', `logs/${String(index).padStart(4, '0')}.log`, 'x')
      }
      storage.seed('acme-logs', 'zz-report.pdf', 'e')

      const matches = await operations.search('report', 'acme-logs')

      expect(matches.map(({ key }) => key)).toEqual([
        'reports/app.log',
        'zz-report.pdf',
      ])
    })

    it('returns an empty array when nothing matches', async () => {
      await expect(operations.search('budget', 'acme-docs')).resolves.toEqual(
        []
      )
    })
  })

  describe('findBucket', () => {
    it('ranks fuzzy matches on bucket names', async () => {
      const result = await operations.findBucket('acme-doc')

      expect(result.found).toBe(true)
      expect(result.bestMatch?.bucketName).toBe('acme-docs')
      expect(result.totalBucketsSearched).toBe(2)
    })

    it('reports no match for an unrelated query', async () => {
      const result = await operations.findBucket('zzzzzzzzzzzz', 5, 0.1)

      expect(result).toMatchObject({ found: false, bestMatch: null, matches: [] })
    })
  })

  describe('readObject', () => {
    it('returns text content and flags truncation', async () => {
      storage.seed('acme-docs', 'notes.txt', 'abcdefghij', {
        contentType: 'text/plain',
      })

      await expect(
        operations.readObject('acme-docs', 'notes.txt', 4)
      ).resolves.toEqual({
        bucket: 'acme-docs',
        key: 'notes.txt',
        content: 'abcd',
        contentType: 'text/plain',
        objectSizeBytes: 10,
        truncated: true,
      })
    })
  })

  it('reports the bucket region', async () => {
    await expect(operations.getBucketLocation('acme-docs')).resolves.toEqual({
      bucket: 'acme-docs',
      region: 'eu-west-1',
    })
  })
})
