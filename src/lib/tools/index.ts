import type { RuntimeContext } from '@mastra/core/runtime-context'
import type { z } from 'zod'
import {
  DELETE_OBJECT_TOOL,
  DOWNLOAD_FILE_TOOL,
  FIND_BUCKET_TOOL,
  GET_BUCKET_LOCATION_TOOL,
  GET_OBJECT_METADATA_TOOL,
  GET_OBJECT_TOOL,
  LIST_BUCKETS_TOOL,
  LIST_OBJECTS_TOOL,
  SEARCH_OBJECTS_TOOL,
  STORAGE_TOOL_NAMES,
  type StorageToolName,
  UPLOAD_FILE_TOOL,
} from '../../constants'
import {
  errorMessage,
  InvalidArgumentsError,
  isStorageAgentError,
  type StorageAgentErrorType,
  withTimeout,
} from '../errors'
import type { Logger } from '../logger'
import type { StorageOperations } from '../storage/storage-operations'
import { createStorageRuntimeContext } from './runtime-context'
import { deleteObjectTool } from './s3/delete-object-tool'
import { downloadFileTool } from './s3/download-file-tool'
import { findBucketTool } from './s3/find-bucket-tool'
import { getBucketLocationTool } from './s3/get-bucket-location-tool'
import { getObjectMetadataTool } from './s3/get-object-metadata-tool'
import { getObjectTool } from './s3/get-object-tool'
import { listBucketsTool } from './s3/list-buckets-tool'
import { listObjectsTool } from './s3/list-objects-tool'
import { searchObjectsTool } from './s3/search-objects-tool'
import { uploadFileTool } from './s3/upload-file-tool'

export const storageTools = {
  [LIST_BUCKETS_TOOL]: listBucketsTool,
  [LIST_OBJECTS_TOOL]: listObjectsTool,
  [UPLOAD_FILE_TOOL]: uploadFileTool,
  [DOWNLOAD_FILE_TOOL]: downloadFileTool,
  [DELETE_OBJECT_TOOL]: deleteObjectTool,
  [GET_OBJECT_METADATA_TOOL]: getObjectMetadataTool,
  [SEARCH_OBJECTS_TOOL]: searchObjectsTool,
  [FIND_BUCKET_TOOL]: findBucketTool,
  [GET_BUCKET_LOCATION_TOOL]: getBucketLocationTool,
  [GET_OBJECT_TOOL]: getObjectTool,
} satisfies Record<StorageToolName, unknown>

type StorageTools = typeof storageTools

/** A validated request for one tool, tagged by tool name. */
export type ToolCall = {
  [Name in StorageToolName]: {
    name: Name
    args: z.output<StorageTools[Name]['inputSchema']>
  }
}[StorageToolName]

export interface ToolDescriptor {
  name: StorageToolName
  description: string
  inputSchema: z.ZodTypeAny
}

export type ToolErrorType = StorageAgentErrorType | 'InternalError'

export type ToolOutcome =
  | { status: 'success'; result: unknown }
  | { status: 'error'; error: { type: ToolErrorType; message: string } }

export interface ToolInvocation {
  callId: string
  toolName: string
  args: unknown
  outcome: ToolOutcome
  durationMs: number
}

export interface ToolRegistryOptions {
  operations: StorageOperations
  downloadDir: string
  timeoutMs: number
  logger: Logger
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

interface ExecutableTool<Context> {
  id: string
  execute?: (context: Context) => Promise<unknown>
}

async function runTool<Context>(
  tool: ExecutableTool<Context>,
  context: Context
): Promise<unknown> {
  if (!tool.execute) {
    throw new Error(`Tool ${tool.id} has no execute function`)
  }
  return tool.execute(context)
}

function parseArgs<Schema extends z.ZodTypeAny>(
  toolName: StorageToolName,
  schema: Schema,
  rawArgs: unknown
): z.output<Schema> {
  const result = schema.safeParse(rawArgs ?? {})
  if (!result.success) {
    throw new InvalidArgumentsError(
      toolName,
      `Invalid arguments for ${toolName}: ${formatIssues(result.error)}`
    )
  }
  return result.data
}

export class ToolRegistry {
  private readonly runtimeContext: RuntimeContext
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(options: ToolRegistryOptions) {
    this.runtimeContext = createStorageRuntimeContext(
      options.operations,
      options.downloadDir
    )
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger
  }

  describe(): ToolDescriptor[] {
    return STORAGE_TOOL_NAMES.map((name) => ({
      name,
      description: storageTools[name].description,
      inputSchema: storageTools[name].inputSchema,
    }))
  }

  /**
   * Validates raw model arguments against the named tool's schema.
   * Throws InvalidArgumentsError for unknown tools and schema mismatches.
   */
  parse(name: string, rawArgs: unknown): ToolCall {
    switch (name) {
      case LIST_BUCKETS_TOOL:
        return {
          name: LIST_BUCKETS_TOOL,
          args: parseArgs(LIST_BUCKETS_TOOL, listBucketsTool.inputSchema, rawArgs),
        }
      case LIST_OBJECTS_TOOL:
        return {
          name: LIST_OBJECTS_TOOL,
          args: parseArgs(LIST_OBJECTS_TOOL, listObjectsTool.inputSchema, rawArgs),
        }
      case UPLOAD_FILE_TOOL:
        return {
          name: UPLOAD_FILE_TOOL,
          args: parseArgs(UPLOAD_FILE_TOOL, uploadFileTool.inputSchema, rawArgs),
        }
      case DOWNLOAD_FILE_TOOL:
        return {
          name: DOWNLOAD_FILE_TOOL,
          args: parseArgs(
            DOWNLOAD_FILE_TOOL,
            downloadFileTool.inputSchema,
            rawArgs
          ),
        }
      case DELETE_OBJECT_TOOL:
        return {
          name: DELETE_OBJECT_TOOL,
          args: parseArgs(
            DELETE_OBJECT_TOOL,
            deleteObjectTool.inputSchema,
            rawArgs
          ),
        }
      case GET_OBJECT_METADATA_TOOL:
        return {
          name: GET_OBJECT_METADATA_TOOL,
          args: parseArgs(
            GET_OBJECT_METADATA_TOOL,
            getObjectMetadataTool.inputSchema,
            rawArgs
          ),
        }
      case SEARCH_OBJECTS_TOOL:
        return {
          name: SEARCH_OBJECTS_TOOL,
          args: parseArgs(
            SEARCH_OBJECTS_TOOL,
            searchObjectsTool.inputSchema,
            rawArgs
          ),
        }
      case FIND_BUCKET_TOOL:
        return {
          name: FIND_BUCKET_TOOL,
          args: parseArgs(FIND_BUCKET_TOOL, findBucketTool.inputSchema, rawArgs),
        }
      case GET_BUCKET_LOCATION_TOOL:
        return {
          name: GET_BUCKET_LOCATION_TOOL,
          args: parseArgs(
            GET_BUCKET_LOCATION_TOOL,
            getBucketLocationTool.inputSchema,
            rawArgs
          ),
        }
      case GET_OBJECT_TOOL:
        return {
          name: GET_OBJECT_TOOL,
          args: parseArgs(GET_OBJECT_TOOL, getObjectTool.inputSchema, rawArgs),
        }
      default:
        throw new InvalidArgumentsError(
          name,
          `Unknown tool: ${name}. Available tools: ${Object.keys(storageTools).join(', ')}`
        )
    }
  }

  private async dispatch(call: ToolCall): Promise<unknown> {
    const { runtimeContext } = this
    switch (call.name) {
      case LIST_BUCKETS_TOOL:
        return runTool(listBucketsTool, { context: call.args, runtimeContext })
      case LIST_OBJECTS_TOOL:
        return runTool(listObjectsTool, { context: call.args, runtimeContext })
      case UPLOAD_FILE_TOOL:
        return runTool(uploadFileTool, { context: call.args, runtimeContext })
      case DOWNLOAD_FILE_TOOL:
        return runTool(downloadFileTool, { context: call.args, runtimeContext })
      case DELETE_OBJECT_TOOL:
        return runTool(deleteObjectTool, { context: call.args, runtimeContext })
      case GET_OBJECT_METADATA_TOOL:
        return runTool(getObjectMetadataTool, {
          context: call.args,
          runtimeContext,
        })
      case SEARCH_OBJECTS_TOOL:
        return runTool(searchObjectsTool, { context: call.args, runtimeContext })
      case FIND_BUCKET_TOOL:
        return runTool(findBucketTool, { context: call.args, runtimeContext })
      case GET_BUCKET_LOCATION_TOOL:
        return runTool(getBucketLocationTool, {
          context: call.args,
          runtimeContext,
        })
      case GET_OBJECT_TOOL:
        return runTool(getObjectTool, { context: call.args, runtimeContext })
      default: {
        const unhandled: never = call
        throw new Error(`Unhandled tool call: ${JSON.stringify(unhandled)}`)
      }
    }
  }

  /**
   * Parses, dispatches and times one tool call. Never rejects: every failure
   * is reported in the outcome so the model can react to it.
   */
  async invoke(
    callId: string,
    toolName: string,
    rawArgs: unknown
  ): Promise<ToolInvocation> {
    const startedAt = Date.now()
    const outcome = await this.run(toolName, rawArgs)
    const durationMs = Date.now() - startedAt
    this.logger.debug(
      `[ToolRegistry] ${toolName} (${callId}) finished with ${outcome.status} in ${durationMs} ms`
    )
    return { callId, toolName, args: rawArgs, outcome, durationMs }
  }

  private async run(toolName: string, rawArgs: unknown): Promise<ToolOutcome> {
    try {
      const call = this.parse(toolName, rawArgs)
      this.logger.info(
        `[ToolRegistry] Invoking ${call.name} with ${JSON.stringify(call.args)}`
      )
      const result = await withTimeout(
        this.dispatch(call),
        this.timeoutMs,
        `Tool ${call.name}`
      )
      return { status: 'success', result }
    } catch (error: unknown) {
      if (isStorageAgentError(error)) {
        this.logger.warn(
          `[ToolRegistry] ${toolName} failed with ${error.type}: ${error.message}`
        )
        return {
          status: 'error',
          error: { type: error.type, message: error.message },
        }
      }
      this.logger.error(
        `[ToolRegistry] ${toolName} failed unexpectedly: ${errorMessage(error)}`
      )
      return {
        status: 'error',
        error: { type: 'InternalError', message: errorMessage(error) },
      }
    }
  }
}
