import {
  type _Object,
  DeleteObjectCommand,
  GetBucketLocationCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  type ListBucketsCommandOutput,
  ListObjectsV2Command,
  type ListObjectsV2CommandInput,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3'
import { fromNodeProviderChain } from '@aws-sdk/credential-providers'
import { DEFAULT_MAX_KEYS, DEFAULT_REGION } from '../../constants'
import type { AwsConfig } from '../config'
import {
  AuthError,
  ConnectivityError,
  errorMessage,
  isStorageAgentError,
  NotFoundError,
  PermissionError,
  StorageAgentError,
  StorageServiceError,
  TimeoutError,
} from '../errors'
import type { Logger } from '../logger'
import type {
  Bucket,
  GetObjectOptions,
  ListObjectsOptions,
  ObjectContent,
  ObjectMetadata,
  ObjectStorage,
  ObjectSummary,
  PutObjectOptions,
} from './object-storage'

// ListObjectsV2 never returns more than this per page
const PAGE_SIZE = 1000

const NOT_FOUND_ERRORS = new Set(['NoSuchBucket', 'NoSuchKey', 'NotFound'])
const AUTH_ERRORS = new Set([
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
  'TokenRefreshRequired',
  'CredentialsProviderError',
])
const PERMISSION_ERRORS = new Set(['AccessDenied', 'AllAccessDisabled'])
const TIMEOUT_ERRORS = new Set(['TimeoutError', 'RequestTimeout'])
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'NetworkingError',
])

export interface StorageErrorTarget {
  operation: string
  bucket?: string
  key?: string
}

function describeTarget({ bucket, key }: StorageErrorTarget): string {
  if (bucket && key) {
    return `s3://${bucket}/${key}`
  }
  return bucket ? `bucket ${bucket}` : 'S3'
}

/**
 * Maps an AWS SDK failure onto the assistant's error kinds.
 */
export function toStorageError(
  error: unknown,
  target: StorageErrorTarget
): StorageAgentError {
  if (isStorageAgentError(error)) {
    return error
  }

  const name = error instanceof Error ? error.name : undefined
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined
  const statusCode =
    error instanceof S3ServiceException
      ? error.$metadata?.httpStatusCode
      : undefined
  const detail = errorMessage(error)
  const where = describeTarget(target)
  const options = { cause: error }

  if ((name && NOT_FOUND_ERRORS.has(name)) || statusCode === 404) {
    if (name === 'NoSuchBucket' || !target.key) {
      return new NotFoundError(
        `Bucket ${target.bucket ?? '(unknown)'} does not exist`,
        options
      )
    }
    return new NotFoundError(`Object not found: ${where}`, options)
  }
  if ((name && AUTH_ERRORS.has(name)) || statusCode === 401) {
    return new AuthError(
      `AWS rejected the credentials during ${target.operation}: ${detail}`,
      options
    )
  }
  if ((name && PERMISSION_ERRORS.has(name)) || statusCode === 403) {
    return new PermissionError(
      `Access denied for ${where} during ${target.operation}`,
      options
    )
  }
  if (name && TIMEOUT_ERRORS.has(name)) {
    return new TimeoutError(`${target.operation} on ${where}`, undefined, options)
  }
  if (
    (code && NETWORK_ERROR_CODES.has(code)) ||
    (name && NETWORK_ERROR_CODES.has(name))
  ) {
    return new ConnectivityError(
      `Could not reach S3 during ${target.operation}: ${detail}`,
      options
    )
  }
  return new StorageServiceError(
    `${target.operation} failed for ${where}: ${detail}`,
    options
  )
}

export function createS3Client(aws: AwsConfig): S3Client {
  return new S3Client({
    region: aws.region,
    credentials:
      aws.credentials ?? fromNodeProviderChain({ profile: aws.profile }),
    endpoint: aws.endpoint,
    forcePathStyle: aws.forcePathStyle,
    maxAttempts: 3,
    retryMode: 'adaptive',
    requestHandler: {
      connectionTimeout: 5_000,
      requestTimeout: 60_000,
    },
  })
}

function toObjectSummary(object: _Object & { Key: string }): ObjectSummary {
  return {
    key: object.Key,
    size: object.Size ?? 0,
    lastModified: object.LastModified,
    storageClass: object.StorageClass,
    etag: object.ETag,
  }
}

// "bytes 0-1023/52345" -> 52345
function totalSizeFromContentRange(contentRange: string | undefined) {
  const total = contentRange?.split('/')[1]
  return total && total !== '*' ? Number(total) : undefined
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly client: S3Client,
    private readonly logger: Logger
  ) {}

  private async call<T>(
    target: StorageErrorTarget,
    send: () => Promise<T>
  ): Promise<T> {
    this.logger.debug(
      `[S3ObjectStorage] ${target.operation} on ${describeTarget(target)}`
    )
    try {
      return await send()
    } catch (error: unknown) {
      const mapped = toStorageError(error, target)
      this.logger.warn(
        `[S3ObjectStorage] ${target.operation} failed with ${mapped.type}: ${mapped.message}`
      )
      throw mapped
    }
  }

  async listBuckets(): Promise<Bucket[]> {
    return this.call({ operation: 'ListBuckets' }, async () => {
      const buckets: Bucket[] = []
      let continuationToken: string | undefined = undefined
      do {
        const response: ListBucketsCommandOutput = await this.client.send(
          new ListBucketsCommand({ ContinuationToken: continuationToken })
        )
        for (const bucket of response.Buckets ?? []) {
          if (bucket.Name) {
            buckets.push({
              name: bucket.Name,
              region: bucket.BucketRegion,
              creationDate: bucket.CreationDate,
            })
          }
        }
        continuationToken = response.ContinuationToken
      } while (continuationToken)
      return buckets
    })
  }

  async getBucketRegion(bucket: string): Promise<string> {
    return this.call({ operation: 'GetBucketLocation', bucket }, async () => {
      const response = await this.client.send(
        new GetBucketLocationCommand({ Bucket: bucket })
      )
      const constraint: string | undefined = response.LocationConstraint
      // Buckets in us-east-1 report no constraint; "EU" is the legacy name of eu-west-1
      if (!constraint) {
        return DEFAULT_REGION
      }
      return constraint === 'EU' ? 'eu-west-1' : constraint
    })
  }

  async listObjects(
    bucket: string,
    options: ListObjectsOptions = {}
  ): Promise<ObjectSummary[]> {
    const limit = options.all
      ? Number.POSITIVE_INFINITY
      : (options.maxKeys ?? DEFAULT_MAX_KEYS)
    return this.call({ operation: 'ListObjectsV2', bucket }, async () => {
      const objects: ObjectSummary[] = []
      let continuationToken: string | undefined = undefined
      do {
        const input: ListObjectsV2CommandInput = {
          Bucket: bucket,
          Prefix: options.prefix,
          MaxKeys: Math.min(PAGE_SIZE, limit - objects.length),
          ContinuationToken: continuationToken,
        }
        const response = await this.client.send(new ListObjectsV2Command(input))
        for (const object of response.Contents ?? []) {
          if (object.Key !== undefined) {
            objects.push(toObjectSummary({ ...object, Key: object.Key }))
          }
        }
        continuationToken = response.NextContinuationToken
      } while (continuationToken && objects.length < limit)
      return objects.slice(0, limit)
    })
  }

  async headObject(bucket: string, key: string): Promise<ObjectMetadata> {
    return this.call({ operation: 'HeadObject', bucket, key }, async () => {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: key })
      )
      return {
        key,
        size: response.ContentLength ?? 0,
        lastModified: response.LastModified,
        contentType: response.ContentType,
        etag: response.ETag,
        metadata: response.Metadata ?? {},
      }
    })
  }

  async getObject(
    bucket: string,
    key: string,
    options: GetObjectOptions = {}
  ): Promise<ObjectContent> {
    const metadata = await this.headObject(bucket, key)
    const { maxBytes } = options
    // A Range header on an empty object is rejected by S3, so only ask for one when it trims something
    const range =
      maxBytes !== undefined && metadata.size > maxBytes
        ? `bytes=0-${maxBytes - 1}`
        : undefined

    return this.call({ operation: 'GetObject', bucket, key }, async () => {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key, Range: range })
      )
      const body = response.Body
        ? await response.Body.transformToByteArray()
        : new Uint8Array()
      const totalSize =
        totalSizeFromContentRange(response.ContentRange) ?? metadata.size
      return {
        metadata: { ...metadata, size: totalSize },
        body,
        truncated: body.byteLength < totalSize,
      }
    })
  }

  async putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    options: PutObjectOptions = {}
  ): Promise<{ etag?: string }> {
    return this.call({ operation: 'PutObject', bucket, key }, async () => {
      const response = await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: options.contentType,
          Metadata: options.metadata,
        })
      )
      return { etag: response.ETag }
    })
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.call({ operation: 'DeleteObject', bucket, key }, async () => {
      await this.client.send(
        new DeleteObjectCommand({ Bucket: bucket, Key: key })
      )
    })
  }
}
