import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { FIND_BUCKET_TOOL } from '../../../constants'
import type { BucketMatch } from '../../storage/storage-operations'
import { getStorageOperations, toIsoString } from '../runtime-context'

const toolInputSchema = z.object({
  query: z
    .string()
    .min(1)
    .describe('Search query to fuzzy match against S3 bucket names'),
  limit: z
    .number()
    .int()
    .min(1)
    .optional()
    .default(5)
    .describe('Maximum number of buckets to return. Defaults to 5.'),
  threshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .default(0.6)
    .describe('Search precision (0-1). Lower is more precise. Defaults to 0.6.'),
})

const bucketMatchSchema = z.object({
  bucketName: z.string(),
  creationDate: z.string().optional(),
  confidence: z.number().describe('Match confidence from 0 to 100'),
})

const toolOutputSchema = z.object({
  found: z.boolean(),
  query: z.string(),
  bestMatch: bucketMatchSchema.nullable(),
  matches: z.array(bucketMatchSchema),
  totalBucketsSearched: z.number(),
  message: z.string().optional(),
})

const toOutput = (match: BucketMatch): z.infer<typeof bucketMatchSchema> => ({
  ...match,
  creationDate: toIsoString(match.creationDate),
})

export const findBucketTool = createTool({
  id: FIND_BUCKET_TOOL,
  description:
    "Finds S3 buckets by fuzzy matching their names. Use this when the user names a bucket loosely or you're unsure of the exact name.",
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const { query, limit, threshold } = context
    const result = await getStorageOperations(runtimeContext).findBucket(
      query,
      limit,
      threshold
    )
    return {
      ...result,
      bestMatch: result.bestMatch ? toOutput(result.bestMatch) : null,
      matches: result.matches.map(toOutput),
      message: result.found
        ? undefined
        : `No buckets found matching '${query}' with the current threshold.`,
    }
  },
})
