export { createS3Agent, S3_AGENT_INSTRUCTIONS } from './s3'
export type { S3AgentDependencies } from './s3'
export { StorageAgent } from './reasoning-loop'
export type { AgentResponse, StorageAgentOptions } from './reasoning-loop'
export { AiSdkDecisionModel, toCoreMessages } from './decision-model'
export type { Decision, DecisionModel, DecisionRequest } from './decision-model'
export { createLanguageModel } from './models'
export { toDisplayTranscript } from './transcript'
export type { DisplayEntry, TranscriptEntry } from './transcript'
