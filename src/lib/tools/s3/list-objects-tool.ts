import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { DEFAULT_MAX_KEYS, LIST_OBJECTS_TOOL } from '../../../constants'
import { getStorageOperations, toIsoString } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The name of the S3 bucket.'),
  prefix: z
    .string()
    .optional()
    .describe('Optional key prefix to filter objects, e.g. "reports/2024/".'),
  maxKeys: z
    .number()
    .int()
    .min(1)
    .optional()
    .default(DEFAULT_MAX_KEYS)
    .describe(
      `Maximum number of objects to return across all pages. Defaults to ${DEFAULT_MAX_KEYS}.`
    ),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  prefix: z.string(),
  objects: z.array(
    z.object({
      key: z.string(),
      size: z.number(),
      lastModified: z.string().optional(),
      storageClass: z.string().optional(),
    })
  ),
  count: z.number(),
  mayHaveMore: z
    .boolean()
    .describe('True when the listing stopped at maxKeys'),
})

export const listObjectsTool = createTool({
  id: LIST_OBJECTS_TOOL,
  description:
    'Lists the objects in an S3 bucket, optionally under a key prefix. Follows pagination up to maxKeys objects.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const { bucket, prefix, maxKeys } = context
    const objects = await getStorageOperations(runtimeContext).listObjects(
      bucket,
      prefix,
      maxKeys
    )
    return {
      bucket,
      prefix: prefix ?? '',
      objects: objects.map((object) => ({
        key: object.key,
        size: object.size,
        lastModified: toIsoString(object.lastModified),
        storageClass: object.storageClass,
      })),
      count: objects.length,
      // Only a hint: a full page at the limit may or may not have more behind it
      mayHaveMore: objects.length === maxKeys,
    }
  },
})
