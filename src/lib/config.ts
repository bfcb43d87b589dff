import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import {
  DEFAULT_LAST_MESSAGES,
  DEFAULT_MAX_STEPS,
  DEFAULT_MODEL_IDS,
  DEFAULT_MODEL_TIMEOUT_MS,
  DEFAULT_PORT,
  DEFAULT_MAX_SESSIONS,
  DEFAULT_REGION,
  DEFAULT_SESSION_IDLE_TTL_MS,
  DEFAULT_TOOL_TIMEOUT_MS,
  LLM_PROVIDERS,
  type LlmProvider,
} from '../constants'
import { ConfigurationError } from './errors'
import { type AppLogLevel, LOG_LEVELS } from './logger'

export interface AwsCredentials {
  accessKeyId: string
  secretAccessKey: string
  sessionToken?: string
}

export interface AwsConfig {
  region: string
  profile?: string
  // Static keys win over the default provider chain when present
  credentials?: AwsCredentials
  endpoint?: string
  forcePathStyle: boolean
}

export interface LlmConfig {
  provider: LlmProvider
  modelId: string
  apiKey?: string
}

export interface AgentConfig {
  maxSteps: number
  lastMessages: number
  toolTimeoutMs: number
  modelTimeoutMs: number
  downloadDir: string
}

export interface ServerConfig {
  port: number
  uploadDir: string
  // Sessions with no turn for this long are discarded
  sessionIdleTtlMs: number
  maxSessions: number
}

export interface AppConfig {
  aws: AwsConfig
  llm: LlmConfig
  agent: AgentConfig
  server: ServerConfig
  logLevel: AppLogLevel
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback)

const EnvSchema = z.object({
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_SESSION_TOKEN: z.string().optional(),
  AWS_REGION: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().optional(),
  AWS_PROFILE: z.string().optional(),
  S3_ENDPOINT: z.string().url().optional(),
  S3_FORCE_PATH_STYLE: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('bedrock'),
  LLM_MODEL_ID: z.string().optional(),
  GOOGLE_GENERATIVE_AI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  AGENT_MAX_STEPS: positiveInt(DEFAULT_MAX_STEPS),
  AGENT_LAST_MESSAGES: positiveInt(DEFAULT_LAST_MESSAGES),
  TOOL_TIMEOUT_MS: positiveInt(DEFAULT_TOOL_TIMEOUT_MS),
  MODEL_TIMEOUT_MS: positiveInt(DEFAULT_MODEL_TIMEOUT_MS),
  DOWNLOAD_DIR: z.string().optional(),
  UPLOAD_DIR: z.string().optional(),
  PORT: positiveInt(DEFAULT_PORT),
  SESSION_IDLE_TTL_MS: positiveInt(DEFAULT_SESSION_IDLE_TTL_MS),
  MAX_SESSIONS: positiveInt(DEFAULT_MAX_SESSIONS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

/**
 * Overrides a user may enter at runtime, e.g. from the web settings panel.
 */
export const SessionSettingsSchema = z
  .object({
    awsAccessKeyId: z.string().trim().min(1).optional(),
    awsSecretAccessKey: z.string().trim().min(1).optional(),
    awsSessionToken: z.string().trim().min(1).optional(),
    awsRegion: z.string().trim().min(1).optional(),
    llmProvider: z.enum(LLM_PROVIDERS).optional(),
    llmModelId: z.string().trim().min(1).optional(),
    llmApiKey: z.string().trim().min(1).optional(),
  })
  .strict()
export type SessionSettings = z.infer<typeof SessionSettingsSchema>

// Blank values in a .env file mean "unset"
function cleanEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {}
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim()
    if (value) {
      cleaned[key] = value
    }
  }
  return cleaned
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

function resolveCredentials(
  accessKeyId: string | undefined,
  secretAccessKey: string | undefined,
  sessionToken: string | undefined
): AwsCredentials | undefined {
  if (!accessKeyId && !secretAccessKey) {
    return undefined
  }
  if (!accessKeyId || !secretAccessKey) {
    throw new ConfigurationError(
      'AWS credentials are incomplete: provide both an access key id and a secret access key, or neither.'
    )
  }
  return { accessKeyId, secretAccessKey, sessionToken }
}

export function validateConfig(config: AppConfig): AppConfig {
  if (config.llm.provider === 'google' && !config.llm.apiKey) {
    throw new ConfigurationError(
      'The google provider needs an API key (GOOGLE_GENERATIVE_AI_API_KEY or GEMINI_API_KEY).'
    )
  }
  return config
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(cleanEnv(env))
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(parsed.error)}`
    )
  }
  const vars = parsed.data

  return validateConfig({
    aws: {
      region: vars.AWS_REGION ?? vars.AWS_DEFAULT_REGION ?? DEFAULT_REGION,
      profile: vars.AWS_PROFILE,
      credentials: resolveCredentials(
        vars.AWS_ACCESS_KEY_ID,
        vars.AWS_SECRET_ACCESS_KEY,
        vars.AWS_SESSION_TOKEN
      ),
      endpoint: vars.S3_ENDPOINT,
      forcePathStyle: vars.S3_FORCE_PATH_STYLE,
    },
    llm: {
      provider: vars.LLM_PROVIDER,
      modelId: vars.LLM_MODEL_ID ?? DEFAULT_MODEL_IDS[vars.LLM_PROVIDER],
      apiKey: vars.GOOGLE_GENERATIVE_AI_API_KEY ?? vars.GEMINI_API_KEY,
    },
    agent: {
      maxSteps: vars.AGENT_MAX_STEPS,
      lastMessages: vars.AGENT_LAST_MESSAGES,
      toolTimeoutMs: vars.TOOL_TIMEOUT_MS,
      modelTimeoutMs: vars.MODEL_TIMEOUT_MS,
      downloadDir: path.resolve(vars.DOWNLOAD_DIR ?? process.cwd()),
    },
    server: {
      port: vars.PORT,
      uploadDir: path.resolve(
        vars.UPLOAD_DIR ?? path.join(os.tmpdir(), 's3-assistant-uploads')
      ),
      sessionIdleTtlMs: vars.SESSION_IDLE_TTL_MS,
      maxSessions: vars.MAX_SESSIONS,
    },
    logLevel: vars.LOG_LEVEL,
  })
}

/**
 * Returns a new config with the session overrides applied. The input config is
 * left untouched so sessions never share mutable state.
 */
export function applySettings(
  config: AppConfig,
  settings: SessionSettings
): AppConfig {
  const provider = settings.llmProvider ?? config.llm.provider
  const providerChanged = provider !== config.llm.provider

  const credentials =
    settings.awsAccessKeyId || settings.awsSecretAccessKey
      ? resolveCredentials(
          settings.awsAccessKeyId,
          settings.awsSecretAccessKey,
          settings.awsSessionToken
        )
      : config.aws.credentials

  return validateConfig({
    ...config,
    aws: {
      ...config.aws,
      region: settings.awsRegion ?? config.aws.region,
      credentials,
    },
    llm: {
      provider,
      modelId:
        settings.llmModelId ??
        (providerChanged ? DEFAULT_MODEL_IDS[provider] : config.llm.modelId),
      apiKey: settings.llmApiKey ?? config.llm.apiKey,
    },
    agent: { ...config.agent },
    server: { ...config.server },
  })
}
