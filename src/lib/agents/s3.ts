import { S3_AGENT } from '../../constants'
import type { AppConfig } from '../config'
import { createAppLogger, type Logger } from '../logger'
import type { ObjectStorage } from '../storage/object-storage'
import { createS3Client, S3ObjectStorage } from '../storage/s3-object-storage'
import { StorageOperations } from '../storage/storage-operations'
import { ToolRegistry } from '../tools'
import { AiSdkDecisionModel, type DecisionModel } from './decision-model'
import { createLanguageModel } from './models'
import { StorageAgent } from './reasoning-loop'

export const S3_AGENT_INSTRUCTIONS = `
You are a helpful AWS S3 assistant. You can list buckets, find buckets by a loose name, list objects, read object content and metadata, search for objects, and upload, download and delete files.

Your primary function is to help users manage and interact with their S3 storage. When responding:
- Use the tools to look things up instead of guessing bucket names, keys or regions.
- If a bucket name looks approximate, use find_bucket before other bucket operations.
- When a message ends with "local_path =<path>", the user attached that file; upload it with upload_file if they asked for it.
- Only call delete_object when the user clearly asked for a deletion, and name the object you deleted.
- A tool result shaped like { "error": { "type", "message", "tool" } } means the call failed. Explain the failure in plain words, or retry with corrected arguments if the mistake was yours.
- Keep answers short. Use lists for more than a few items and give sizes in human-readable units.

Always ask for clarification if a bucket name or object key is ambiguous. Be careful with upload_file and confirm with the user if the key might overwrite an existing object, unless they explicitly state to overwrite.
`.trim()

export interface S3AgentDependencies {
  storage?: ObjectStorage
  decisionModel?: DecisionModel
  logger?: Logger
}

/**
 * Builds an agent with its own S3 client, model and transcript from one
 * config. Dependencies are injectable so tests can run without AWS or an LLM.
 */
export function createS3Agent(
  config: AppConfig,
  deps: S3AgentDependencies = {}
): StorageAgent {
  const logger = deps.logger ?? createAppLogger('S3Agent', config.logLevel)
  const storage =
    deps.storage ?? new S3ObjectStorage(createS3Client(config.aws), logger)
  const decisionModel =
    deps.decisionModel ??
    new AiSdkDecisionModel(createLanguageModel(config.llm, config.aws), {
      timeoutMs: config.agent.modelTimeoutMs,
    })

  return new StorageAgent({
    name: S3_AGENT,
    instructions: S3_AGENT_INSTRUCTIONS,
    decisionModel,
    registry: new ToolRegistry({
      operations: new StorageOperations(storage, logger),
      downloadDir: config.agent.downloadDir,
      timeoutMs: config.agent.toolTimeoutMs,
      logger,
    }),
    maxSteps: config.agent.maxSteps,
    lastMessages: config.agent.lastMessages,
    logger,
  })
}
