import { ConsoleLogger } from '@mastra/core/logger'

export type Logger = ConsoleLogger

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type AppLogLevel = (typeof LOG_LEVELS)[number]

export function createAppLogger(name: string, level: AppLogLevel): Logger {
  return new ConsoleLogger({ name, level })
}
