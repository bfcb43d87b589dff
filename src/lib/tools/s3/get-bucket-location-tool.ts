import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { GET_BUCKET_LOCATION_TOOL } from '../../../constants'
import { getStorageOperations } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The name of the S3 bucket.'),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  region: z
    .string()
    .describe("The bucket's region. Buckets without a location constraint are in us-east-1."),
})

export const getBucketLocationTool = createTool({
  id: GET_BUCKET_LOCATION_TOOL,
  description: 'Returns the AWS region an S3 bucket lives in.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    return getStorageOperations(runtimeContext).getBucketLocation(context.bucket)
  },
})
