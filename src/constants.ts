export const S3_AGENT = 's3Agent' as const

// Tool identifiers exposed to the language model
export const LIST_BUCKETS_TOOL = 'list_buckets' as const
export const LIST_OBJECTS_TOOL = 'list_objects' as const
export const UPLOAD_FILE_TOOL = 'upload_file' as const
export const DOWNLOAD_FILE_TOOL = 'download_file' as const
export const DELETE_OBJECT_TOOL = 'delete_object' as const
export const GET_OBJECT_METADATA_TOOL = 'get_object_metadata' as const
export const SEARCH_OBJECTS_TOOL = 'search_objects' as const
export const FIND_BUCKET_TOOL = 'find_bucket' as const
export const GET_BUCKET_LOCATION_TOOL = 'get_bucket_location' as const
export const GET_OBJECT_TOOL = 'get_object' as const

export const STORAGE_TOOL_NAMES = [
  LIST_BUCKETS_TOOL,
  LIST_OBJECTS_TOOL,
  UPLOAD_FILE_TOOL,
  DOWNLOAD_FILE_TOOL,
  DELETE_OBJECT_TOOL,
  GET_OBJECT_METADATA_TOOL,
  SEARCH_OBJECTS_TOOL,
  FIND_BUCKET_TOOL,
  GET_BUCKET_LOCATION_TOOL,
  GET_OBJECT_TOOL,
] as const
export type StorageToolName = (typeof STORAGE_TOOL_NAMES)[number]

export const LLM_PROVIDERS = ['bedrock', 'google'] as const
export type LlmProvider = (typeof LLM_PROVIDERS)[number]

export const DEFAULT_MODEL_IDS: Record<LlmProvider, string> = {
  bedrock: 'us.anthropic.claude-3-7-sonnet-20250219-v1:0',
  google: 'gemini-2.0-flash',
}

export const DEFAULT_REGION = 'us-east-1'
export const DEFAULT_MAX_STEPS = 8
export const DEFAULT_LAST_MESSAGES = 42
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000
export const DEFAULT_MODEL_TIMEOUT_MS = 60_000
export const DEFAULT_PORT = 7860
export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60 * 1000
export const DEFAULT_MAX_SESSIONS = 100

// Listing and reading limits
export const DEFAULT_MAX_KEYS = 1000
export const MAX_CONTENT_LENGTH = 100 * 1024
