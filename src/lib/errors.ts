export const STORAGE_AGENT_ERROR_TYPES = [
  'AuthError',
  'ConnectivityError',
  'NotFoundError',
  'PermissionError',
  'InvalidArgumentsError',
  'LoopExceededError',
  'TimeoutError',
  'StorageServiceError',
  'ConfigurationError',
  'ModelError',
] as const
export type StorageAgentErrorType = (typeof STORAGE_AGENT_ERROR_TYPES)[number]

/**
 * Base class for every error the assistant raises on purpose. `type` is the
 * discriminant reported back to the model and to the shells.
 */
export abstract class StorageAgentError extends Error {
  abstract readonly type: StorageAgentErrorType

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class AuthError extends StorageAgentError {
  readonly type = 'AuthError'
}

export class ConnectivityError extends StorageAgentError {
  readonly type = 'ConnectivityError'
}

export class NotFoundError extends StorageAgentError {
  readonly type = 'NotFoundError'
}

export class PermissionError extends StorageAgentError {
  readonly type = 'PermissionError'
}

export class StorageServiceError extends StorageAgentError {
  readonly type = 'StorageServiceError'
}

export class InvalidArgumentsError extends StorageAgentError {
  readonly type = 'InvalidArgumentsError'

  constructor(
    readonly toolName: string,
    message: string
  ) {
    super(message)
  }
}

export class LoopExceededError extends StorageAgentError {
  readonly type = 'LoopExceededError'

  constructor(readonly maxSteps: number) {
    super(
      `Gave up after ${maxSteps} tool invocations without a final answer from the model.`
    )
  }
}

export class TimeoutError extends StorageAgentError {
  readonly type = 'TimeoutError'

  constructor(
    readonly operation: string,
    readonly timeoutMs?: number,
    options?: { cause?: unknown }
  ) {
    super(
      timeoutMs === undefined
        ? `${operation} timed out`
        : `${operation} timed out after ${timeoutMs} ms`,
      options
    )
  }
}

export class ConfigurationError extends StorageAgentError {
  readonly type = 'ConfigurationError'
}

export class ModelError extends StorageAgentError {
  readonly type = 'ModelError'
}

export function isStorageAgentError(
  error: unknown
): error is StorageAgentError {
  return error instanceof StorageAgentError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Rejects with a TimeoutError when `promise` has not settled within `timeoutMs`.
 * The underlying work is not cancelled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(operation, timeoutMs)),
      timeoutMs
    )
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
