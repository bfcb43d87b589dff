import { DEFAULT_MAX_KEYS } from '../constants'
import { NotFoundError } from '../lib/errors'
import type {
  Bucket,
  GetObjectOptions,
  ListObjectsOptions,
  ObjectContent,
  ObjectMetadata,
  ObjectStorage,
  ObjectSummary,
  PutObjectOptions,
} from '../lib/storage/object-storage'

interface StoredObject {
  body: Uint8Array
  contentType?: string
  metadata: Record<string, string>
  lastModified: Date
  etag: string
}

interface StoredBucket {
  region: string
  creationDate: Date
  objects: Map<string, StoredObject>
}

/**
 * Object store held in process memory, with S3's visible semantics: keys are
 * listed in lexicographic order and a missing bucket or key is a NotFoundError.
 */
export class InMemoryObjectStorage implements ObjectStorage {
  private readonly buckets = new Map<string, StoredBucket>()
  private etagCounter = 0
  readonly calls: string[] = []

  createBucket(name: string, region = 'us-east-1'): this {
    this.buckets.set(name, {
      region,
      creationDate: new Date('2024-01-01T00:00:00Z'),
      objects: new Map(),
    })
    return this
  }

  seed(
    bucket: string,
    key: string,
    content: string,
    options: PutObjectOptions = {}
  ): this {
    this.requireBucket(bucket).objects.set(key, {
      body: new TextEncoder().encode(content),
      contentType: options.contentType,
      metadata: options.metadata ?? {},
      lastModified: new Date('2024-02-01T00:00:00Z'),
      etag: this.nextEtag(),
    })
    return this
  }

  private nextEtag(): string {
    this.etagCounter += 1
    return `"etag-${this.etagCounter}"`
  }

  private requireBucket(name: string): StoredBucket {
    const bucket = this.buckets.get(name)
    if (!bucket) {
      throw new NotFoundError(`Bucket ${name} does not exist`)
    }
    return bucket
  }

  private requireObject(bucket: string, key: string): StoredObject {
    const object = this.requireBucket(bucket).objects.get(key)
    if (!object) {
      throw new NotFoundError(`Object not found: s3://${bucket}/${key}`)
    }
    return object
  }

  private describe(key: string, object: StoredObject): ObjectMetadata {
    return {
      key,
      size: object.body.byteLength,
      lastModified: object.lastModified,
      contentType: object.contentType,
      etag: object.etag,
      metadata: { ...object.metadata },
    }
  }

  async listBuckets(): Promise<Bucket[]> {
    this.calls.push('listBuckets')
    return [...this.buckets.entries()].map(([name, bucket]) => ({
      name,
      region: bucket.region,
      creationDate: bucket.creationDate,
    }))
  }

  async getBucketRegion(bucket: string): Promise<string> {
    this.calls.push(`getBucketRegion:${bucket}`)
    return this.requireBucket(bucket).region
  }

  async listObjects(
    bucket: string,
    options: ListObjectsOptions = {}
  ): Promise<ObjectSummary[]> {
    this.calls.push(`listObjects:${bucket}`)
    const { objects } = this.requireBucket(bucket)
    const limit = options.all
      ? Number.POSITIVE_INFINITY
      : (options.maxKeys ?? DEFAULT_MAX_KEYS)
    return [...objects.keys()]
      .filter((key) => key.startsWith(options.prefix ?? ''))
      .sort()
      .slice(0, limit)
      .map((key) => {
        const object = this.requireObject(bucket, key)
        return {
          key,
          size: object.body.byteLength,
          lastModified: object.lastModified,
          etag: object.etag,
        }
      })
  }

  async headObject(bucket: string, key: string): Promise<ObjectMetadata> {
    this.calls.push(`headObject:${bucket}/${key}`)
    return this.describe(key, this.requireObject(bucket, key))
  }

  async getObject(
    bucket: string,
    key: string,
    options: GetObjectOptions = {}
  ): Promise<ObjectContent> {
    this.calls.push(`getObject:${bucket}/${key}`)
    const object = this.requireObject(bucket, key)
    const body = object.body.slice(0, options.maxBytes)
    return {
      metadata: this.describe(key, object),
      body,
      truncated: body.byteLength < object.body.byteLength,
    }
  }

  async putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    options: PutObjectOptions = {}
  ): Promise<{ etag?: string }> {
    this.calls.push(`putObject:${bucket}/${key}`)
    const etag = this.nextEtag()
    this.requireBucket(bucket).objects.set(key, {
      body: Uint8Array.from(body),
      contentType: options.contentType,
      metadata: { ...options.metadata },
      lastModified: new Date(),
      etag,
    })
    return { etag }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    this.calls.push(`deleteObject:${bucket}/${key}`)
    this.requireBucket(bucket).objects.delete(key)
  }
}
