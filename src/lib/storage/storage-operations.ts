import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'
import Fuse, { type IFuseOptions } from 'fuse.js'
import { DEFAULT_MAX_KEYS, MAX_CONTENT_LENGTH } from '../../constants'
import {
  errorMessage,
  InvalidArgumentsError,
  NotFoundError,
  PermissionError,
} from '../errors'
import type { Logger } from '../logger'
import type {
  Bucket,
  ObjectMetadata,
  ObjectStorage,
  ObjectSummary,
} from './object-storage'

export interface UploadOptions {
  contentType?: string
  metadata?: Record<string, string>
}

export interface UploadResult {
  bucket: string
  key: string
  size: number
  etag?: string
}

export interface DownloadResult {
  bucket: string
  key: string
  localPath: string
  bytesWritten: number
}

export interface DeleteResult {
  bucket: string
  key: string
  deleted: true
}

export interface SearchMatch {
  bucket: string
  key: string
  size: number
  lastModified?: Date
  matchedOn: 'key' | 'metadata'
}

export interface BucketMatch {
  bucketName: string
  creationDate?: Date
  // 0-100, higher is closer
  confidence: number
}

export interface FindBucketResult {
  found: boolean
  query: string
  bestMatch: BucketMatch | null
  matches: BucketMatch[]
  totalBucketsSearched: number
}

export interface ReadObjectResult {
  bucket: string
  key: string
  content: string
  contentType?: string
  objectSizeBytes: number
  truncated: boolean
}

function hasErrorCode(error: unknown, code: string): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === code
  )
}

function includesIgnoringCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle)
}

/**
 * The storage actions the assistant can take. Each method maps to exactly one
 * remote query or mutation (plus the local file read/write for transfers) and
 * fails with one of the named StorageAgentError kinds.
 */
export class StorageOperations {
  constructor(
    private readonly storage: ObjectStorage,
    private readonly logger: Logger
  ) {}

  async listBuckets(): Promise<Bucket[]> {
    return this.storage.listBuckets()
  }

  async listObjects(
    bucket: string,
    prefix?: string,
    maxKeys: number = DEFAULT_MAX_KEYS
  ): Promise<ObjectSummary[]> {
    const objects = await this.storage.listObjects(bucket, { prefix, maxKeys })
    this.logger.debug(
      `[StorageOperations] Listed ${objects.length} objects in ${bucket} (prefix: ${prefix ?? ''})`
    )
    return objects
  }

  async upload(
    bucket: string,
    localPath: string,
    key?: string,
    options: UploadOptions = {}
  ): Promise<UploadResult> {
    const body = await this.readLocalFile(localPath)
    const objectKey = key ?? path.basename(localPath)
    const { etag } = await this.storage.putObject(bucket, objectKey, body, {
      contentType: options.contentType,
      metadata: options.metadata,
    })
    this.logger.info(
      `[StorageOperations] Uploaded ${localPath} to s3://${bucket}/${objectKey} (${body.byteLength} bytes)`
    )
    return { bucket, key: objectKey, size: body.byteLength, etag }
  }

  async download(
    bucket: string,
    key: string,
    localPath: string
  ): Promise<DownloadResult> {
    const { body } = await this.storage.getObject(bucket, key)
    const target = path.resolve(localPath)
    try {
      await mkdir(path.dirname(target), { recursive: true })
      await writeFile(target, body)
    } catch (error: unknown) {
      if (hasErrorCode(error, 'EACCES') || hasErrorCode(error, 'EPERM')) {
        throw new PermissionError(`Cannot write to ${target}`, { cause: error })
      }
      throw error
    }
    this.logger.info(
      `[StorageOperations] Downloaded s3://${bucket}/${key} to ${target} (${body.byteLength} bytes)`
    )
    return { bucket, key, localPath: target, bytesWritten: body.byteLength }
  }

  async delete(bucket: string, key: string): Promise<DeleteResult> {
    // DeleteObject succeeds for missing keys, so check first
    await this.storage.headObject(bucket, key)
    await this.storage.deleteObject(bucket, key)
    this.logger.info(`[StorageOperations] Deleted s3://${bucket}/${key}`)
    return { bucket, key, deleted: true }
  }

  async getMetadata(bucket: string, key: string): Promise<ObjectMetadata> {
    return this.storage.headObject(bucket, key)
  }

  /**
   * Case-insensitive substring search over object keys, then over user
   * metadata keys and values. Without a bucket every bucket is searched and
   * buckets that cannot be listed are skipped.
   */
  async search(query: string, bucket?: string): Promise<SearchMatch[]> {
    const needle = query.toLowerCase()
    if (bucket) {
      return this.searchBucket(bucket, needle)
    }

    const matches: SearchMatch[] = []
    for (const { name } of await this.storage.listBuckets()) {
      try {
        matches.push(...(await this.searchBucket(name, needle)))
      } catch (error: unknown) {
        this.logger.warn(
          `[StorageOperations] Skipping bucket ${name} during search: ${errorMessage(error)}`
        )
      }
    }
    return matches
  }

  private async searchBucket(
    bucket: string,
    needle: string
  ): Promise<SearchMatch[]> {
    const matches: SearchMatch[] = []
    const objects = await this.storage.listObjects(bucket, { all: true })
    for (const object of objects) {
      const match = {
        bucket,
        key: object.key,
        size: object.size,
        lastModified: object.lastModified,
      }
      if (includesIgnoringCase(object.key, needle)) {
        matches.push({ ...match, matchedOn: 'key' })
        continue
      }
      const { metadata } = await this.storage.headObject(bucket, object.key)
      const metadataMatches = Object.entries(metadata).some(
        ([name, value]) =>
          includesIgnoringCase(name, needle) ||
          includesIgnoringCase(value, needle)
      )
      if (metadataMatches) {
        matches.push({ ...match, matchedOn: 'metadata' })
      }
    }
    return matches
  }

  async findBucket(
    query: string,
    limit: number = 5,
    threshold: number = 0.6
  ): Promise<FindBucketResult> {
    const buckets = await this.storage.listBuckets()
    const fuseOptions: IFuseOptions<Bucket> = {
      includeScore: true,
      threshold,
      keys: ['name'],
    }
    const matches = new Fuse(buckets, fuseOptions)
      .search(query)
      .slice(0, limit)
      .map((result) => ({
        bucketName: result.item.name,
        creationDate: result.item.creationDate,
        confidence: Math.round((1 - (result.score ?? 1)) * 100),
      }))

    return {
      found: matches.length > 0,
      query,
      bestMatch: matches[0] ?? null,
      matches,
      totalBucketsSearched: buckets.length,
    }
  }

  async getBucketLocation(
    bucket: string
  ): Promise<{ bucket: string; region: string }> {
    return { bucket, region: await this.storage.getBucketRegion(bucket) }
  }

  async readObject(
    bucket: string,
    key: string,
    maxBytes: number = MAX_CONTENT_LENGTH
  ): Promise<ReadObjectResult> {
    const { metadata, body, truncated } = await this.storage.getObject(
      bucket,
      key,
      { maxBytes }
    )
    return {
      bucket,
      key,
      content: new TextDecoder('utf-8').decode(body),
      contentType: metadata.contentType,
      objectSizeBytes: metadata.size,
      truncated,
    }
  }

  private async readLocalFile(localPath: string): Promise<Uint8Array> {
    try {
      const info = await stat(localPath)
      if (info.isDirectory()) {
        throw new InvalidArgumentsError(
          'upload_file',
          `${localPath} is a directory, not a file`
        )
      }
      return await readFile(localPath)
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new NotFoundError(`Local file ${localPath} does not exist`, {
          cause: error,
        })
      }
      if (hasErrorCode(error, 'EACCES') || hasErrorCode(error, 'EPERM')) {
        throw new PermissionError(`Cannot read local file ${localPath}`, {
          cause: error,
        })
      }
      throw error
    }
  }
}
