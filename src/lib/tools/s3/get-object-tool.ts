import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { GET_OBJECT_TOOL, MAX_CONTENT_LENGTH } from '../../../constants'
import { getStorageOperations } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The name of the S3 bucket.'),
  key: z.string().min(1).describe('The key of the object in the S3 bucket.'),
  maxSize: z
    .number()
    .int()
    .min(1)
    .max(MAX_CONTENT_LENGTH)
    .optional()
    .default(MAX_CONTENT_LENGTH)
    .describe(
      `Maximum number of bytes to return. Larger objects are truncated. Default: ${MAX_CONTENT_LENGTH} bytes.`
    ),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  key: z.string(),
  content: z.string().describe('The object content decoded as UTF-8'),
  contentType: z.string().optional(),
  objectSizeBytes: z.number(),
  truncated: z.boolean(),
})

export const getObjectTool = createTool({
  id: GET_OBJECT_TOOL,
  description:
    'Reads the content of a text object from an S3 bucket so it can be summarised or quoted. Large objects are truncated.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const { bucket, key, maxSize } = context
    return getStorageOperations(runtimeContext).readObject(bucket, key, maxSize)
  },
})
