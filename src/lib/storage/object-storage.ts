/**
 * Provider-neutral view of an object store. The S3 implementation lives in
 * `s3-object-storage.ts`; tests use an in-memory one.
 *
 * Every method rejects with a StorageAgentError subclass (NotFoundError,
 * AuthError, PermissionError, ConnectivityError, TimeoutError or
 * StorageServiceError).
 */

export interface Bucket {
  name: string
  region?: string
  creationDate?: Date
}

export interface ObjectSummary {
  key: string
  size: number
  lastModified?: Date
  storageClass?: string
  etag?: string
}

export interface ObjectMetadata {
  key: string
  size: number
  lastModified?: Date
  contentType?: string
  etag?: string
  // User-defined x-amz-meta-* entries
  metadata: Record<string, string>
}

export interface ObjectContent {
  metadata: ObjectMetadata
  body: Uint8Array
  // True when body holds only the first `maxBytes` of the object
  truncated: boolean
}

export interface ListObjectsOptions {
  prefix?: string
  // Defaults to DEFAULT_MAX_KEYS
  maxKeys?: number
  // Follow every page and ignore maxKeys
  all?: boolean
}

export interface GetObjectOptions {
  maxBytes?: number
}

export interface PutObjectOptions {
  contentType?: string
  metadata?: Record<string, string>
}

export interface ObjectStorage {
  listBuckets(): Promise<Bucket[]>
  getBucketRegion(bucket: string): Promise<string>
  listObjects(bucket: string, options?: ListObjectsOptions): Promise<ObjectSummary[]>
  headObject(bucket: string, key: string): Promise<ObjectMetadata>
  getObject(
    bucket: string,
    key: string,
    options?: GetObjectOptions
  ): Promise<ObjectContent>
  putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    options?: PutObjectOptions
  ): Promise<{ etag?: string }>
  deleteObject(bucket: string, key: string): Promise<void>
}
