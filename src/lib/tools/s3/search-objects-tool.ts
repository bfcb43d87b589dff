import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { SEARCH_OBJECTS_TOOL } from '../../../constants'
import { getStorageOperations, toIsoString } from '../runtime-context'

const toolInputSchema = z.object({
  query: z
    .string()
    .min(1)
    .describe('Text to look for in object keys and user metadata (case-insensitive).'),
  bucket: z
    .string()
    .min(1)
    .optional()
    .describe('Bucket to search. When omitted every bucket in the account is searched.'),
})

const toolOutputSchema = z.object({
  query: z.string(),
  matches: z.array(
    z.object({
      bucket: z.string(),
      key: z.string(),
      size: z.number(),
      lastModified: z.string().optional(),
      matchedOn: z.enum(['key', 'metadata']),
    })
  ),
  count: z.number(),
})

export const searchObjectsTool = createTool({
  id: SEARCH_OBJECTS_TOOL,
  description:
    'Finds objects whose key or user metadata contains the query text. An empty result means nothing matched.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const matches = await getStorageOperations(runtimeContext).search(
      context.query,
      context.bucket
    )
    return {
      query: context.query,
      matches: matches.map((match) => ({
        ...match,
        lastModified: toIsoString(match.lastModified),
      })),
      count: matches.length,
    }
  },
})
