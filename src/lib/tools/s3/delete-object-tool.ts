import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { DELETE_OBJECT_TOOL } from '../../../constants'
import { getStorageOperations } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The S3 bucket holding the object.'),
  key: z.string().min(1).describe('The key of the object to delete.'),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  key: z.string(),
  deleted: z.literal(true),
})

export const deleteObjectTool = createTool({
  id: DELETE_OBJECT_TOOL,
  description:
    'Deletes a single object from an S3 bucket. Fails if the object does not exist. Only call this when the user clearly asked to delete.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    return getStorageOperations(runtimeContext).delete(context.bucket, context.key)
  },
})
