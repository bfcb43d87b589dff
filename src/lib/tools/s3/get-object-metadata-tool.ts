import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { GET_OBJECT_METADATA_TOOL } from '../../../constants'
import { getStorageOperations, toIsoString } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The S3 bucket holding the object.'),
  key: z.string().min(1).describe('The key of the object.'),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  key: z.string(),
  size: z.number(),
  lastModified: z.string().optional(),
  contentType: z.string().optional(),
  etag: z.string().optional(),
  metadata: z.record(z.string()).describe('User-defined metadata'),
})

export const getObjectMetadataTool = createTool({
  id: GET_OBJECT_METADATA_TOOL,
  description:
    'Returns the size, last modified time, content type, ETag and user metadata of an object without downloading it.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const metadata = await getStorageOperations(runtimeContext).getMetadata(
      context.bucket,
      context.key
    )
    return {
      bucket: context.bucket,
      ...metadata,
      lastModified: toIsoString(metadata.lastModified),
    }
  },
})
