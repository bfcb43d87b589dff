import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { LIST_BUCKETS_TOOL } from '../../../constants'
import { getStorageOperations, toIsoString } from '../runtime-context'

const toolInputSchema = z.object({})

const toolOutputSchema = z.object({
  buckets: z.array(
    z.object({
      name: z.string(),
      region: z.string().optional(),
      creationDate: z.string().optional(),
    })
  ),
  count: z.number(),
})

export const listBucketsTool = createTool({
  id: LIST_BUCKETS_TOOL,
  description:
    'Lists all S3 buckets in the account, with their creation date and region where known.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const buckets = await getStorageOperations(runtimeContext).listBuckets()
    return {
      buckets: buckets.map((bucket) => ({
        name: bucket.name,
        region: bucket.region,
        creationDate: toIsoString(bucket.creationDate),
      })),
      count: buckets.length,
    }
  },
})
