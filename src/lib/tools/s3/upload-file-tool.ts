import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { UPLOAD_FILE_TOOL } from '../../../constants'
import { getStorageOperations } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The destination S3 bucket.'),
  localPath: z
    .string()
    .min(1)
    .describe('Path of the local file to upload.'),
  key: z
    .string()
    .min(1)
    .optional()
    .describe(
      'Destination object key. Defaults to the base name of the local file.'
    ),
  contentType: z
    .string()
    .optional()
    .describe('Optional MIME type to store with the object.'),
  metadata: z
    .record(z.string())
    .optional()
    .describe('Optional user metadata as string key/value pairs.'),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  key: z.string(),
  size: z.number().describe('Uploaded size in bytes'),
  etag: z.string().optional(),
})

export const uploadFileTool = createTool({
  id: UPLOAD_FILE_TOOL,
  description:
    'Uploads a local file to an S3 bucket. Use this when the user attaches a file or names a local path.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const { bucket, localPath, key, contentType, metadata } = context
    return getStorageOperations(runtimeContext).upload(bucket, localPath, key, {
      contentType,
      metadata,
    })
  },
})
