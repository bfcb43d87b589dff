import type { Server } from 'node:http'
import { type AgentFactory, SessionManager } from '../lib'
import type { AppConfig } from '../lib/config'
import { errorMessage } from '../lib/errors'
import type { Logger } from '../lib/logger'
import { createApp } from './app'

const MAX_SWEEP_INTERVAL_MS = 60_000

export function startServer(
  config: AppConfig,
  logger: Logger,
  agentFactory?: AgentFactory
): Promise<Server> {
  const sessions = new SessionManager(config, logger, agentFactory)
  const app = createApp({ sessions, logger })

  const sweeper = setInterval(
    () => {
      sessions
        .sweep()
        .then((discarded) => {
          if (discarded > 0) {
            logger.info(`[Server] Discarded ${discarded} idle sessions`)
          }
        })
        .catch((error: unknown) => {
          logger.error(`[Server] Session sweep failed: ${errorMessage(error)}`)
        })
    },
    Math.min(config.server.sessionIdleTtlMs, MAX_SWEEP_INTERVAL_MS)
  )
  sweeper.unref()

  return new Promise((resolve, reject) => {
    const server = app.listen(config.server.port, () => {
      logger.info(
        `[Server] S3 Assistant listening on http://localhost:${config.server.port}`
      )
      resolve(server)
    })
    server.once('close', () => clearInterval(sweeper))
    server.once('error', (error) => {
      clearInterval(sweeper)
      reject(error)
    })
  })
}
