import { Readable } from 'node:stream'
import {
  S3Client,
  type ServiceInputTypes,
  type ServiceOutputTypes,
} from '@aws-sdk/client-s3'
import { sdkStreamMixin } from '@smithy/util-stream'

export interface S3Request {
  commandName: string
  input: ServiceInputTypes
}

export type S3Responder = (
  request: S3Request
) => ServiceOutputTypes | Promise<ServiceOutputTypes>

/**
 * S3Client whose commands are answered in process. The responder runs first in
 * the initialize step, so nothing is serialized, signed or sent.
 */
export function createStubS3Client(respond: S3Responder) {
  const requests: S3Request[] = []
  const client = new S3Client({
    region: 'us-east-1',
    credentials: {
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    },
  })
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const request = {
        commandName: String(context.commandName),
        input: args.input,
      }
      requests.push(request)
      return { output: await respond(request), response: {} }
    },
    { step: 'initialize', name: 'stubS3Responses', priority: 'high' }
  )
  return { client, requests }
}

export function streamingBody(content: string) {
  return sdkStreamMixin(Readable.from([Buffer.from(content)]))
}

/**
 * Serves ListObjectsV2 from `keys` in pages of at most `pageSize`, using the
 * start index as the continuation token.
 */
export function listObjectsPage(
  keys: readonly string[],
  input: ServiceInputTypes,
  pageSize = 1000
): ServiceOutputTypes {
  const start =
    'ContinuationToken' in input && input.ContinuationToken
      ? Number(input.ContinuationToken)
      : 0
  const maxKeys =
    'MaxKeys' in input && input.MaxKeys !== undefined
      ? Math.min(input.MaxKeys, pageSize)
      : pageSize
  const end = Math.min(start + maxKeys, keys.length)
  return {
    $metadata: {},
    Contents: keys.slice(start, end).map((key) => ({ Key: key, Size: 1 })),
    KeyCount: end - start,
    IsTruncated: end < keys.length,
    NextContinuationToken: end < keys.length ? String(end) : undefined,
  }
}
