import path from 'node:path'
import { createTool, type ToolExecutionContext } from '@mastra/core/tools'
import { z } from 'zod'
import { DOWNLOAD_FILE_TOOL } from '../../../constants'
import { getDownloadDir, getStorageOperations } from '../runtime-context'

const toolInputSchema = z.object({
  bucket: z.string().min(1).describe('The S3 bucket holding the object.'),
  key: z.string().min(1).describe('The key of the object to download.'),
  localPath: z
    .string()
    .min(1)
    .optional()
    .describe(
      'Where to write the file locally. Defaults to the object name in the download directory.'
    ),
})

const toolOutputSchema = z.object({
  bucket: z.string(),
  key: z.string(),
  localPath: z.string().describe('Absolute path of the written file.'),
  bytesWritten: z.number(),
})

export const downloadFileTool = createTool({
  id: DOWNLOAD_FILE_TOOL,
  description:
    'Downloads an object from S3 to a local file. Parent directories are created as needed.',
  inputSchema: toolInputSchema,
  outputSchema: toolOutputSchema,
  async execute({
    context,
    runtimeContext,
  }: ToolExecutionContext<typeof toolInputSchema>): Promise<
    z.infer<typeof toolOutputSchema>
  > {
    const { bucket, key } = context
    const localPath =
      context.localPath ??
      path.join(getDownloadDir(runtimeContext), path.posix.basename(key))
    return getStorageOperations(runtimeContext).download(bucket, key, localPath)
  },
})
