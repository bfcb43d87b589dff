import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express'
import { nanoid } from 'nanoid'
import { toDisplayTranscript } from '../lib/agents'
import {
  ConfigurationError,
  errorMessage,
  isStorageAgentError,
  LoopExceededError,
  TimeoutError,
} from '../lib/errors'
import {
  SessionBusyError,
  SessionLimitError,
  type SessionManager,
  SessionNotFoundError,
} from '../lib'
import type { Logger } from '../lib/logger'
import {
  type Attachment,
  CreateSessionBodySchema,
  MessageBodySchema,
  parseBody,
  RequestValidationError,
  UpdateSettingsBodySchema,
  withAttachmentPath,
} from './shared'

// Leaves room for a base64 attachment of a few megabytes
const REQUEST_BODY_LIMIT = '25mb'

const INDEX_HTML = fileURLToPath(new URL('./public/index.html', import.meta.url))

export interface AppDependencies {
  sessions: SessionManager
  logger: Logger
}

interface HttpError {
  status: number
  body: Record<string, unknown>
}

function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next)
  }
}

// body-parser marks its own failures with a `type`
function bodyParserErrorType(error: unknown): string | undefined {
  return error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string'
    ? error.type
    : undefined
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof RequestValidationError) {
    return {
      status: 400,
      body: {
        message: 'Invalid request',
        errors: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    }
  }
  if (error instanceof SessionNotFoundError) {
    return { status: 404, body: { message: error.message } }
  }
  if (error instanceof SessionBusyError) {
    return { status: 409, body: { message: error.message } }
  }
  if (error instanceof SessionLimitError) {
    return { status: 503, body: { message: error.message } }
  }

  const parserErrorType = bodyParserErrorType(error)
  if (parserErrorType === 'entity.parse.failed') {
    return { status: 400, body: { message: 'Invalid JSON in request body' } }
  }
  if (parserErrorType === 'entity.too.large') {
    return { status: 413, body: { message: 'Request body is too large' } }
  }

  if (error instanceof LoopExceededError) {
    return {
      status: 422,
      body: {
        message: 'The assistant gave up before reaching an answer',
        error: error.message,
        type: error.type,
      },
    }
  }
  if (error instanceof TimeoutError) {
    return {
      status: 504,
      body: {
        message: 'The request timed out',
        error: error.message,
        type: error.type,
      },
    }
  }
  if (error instanceof ConfigurationError) {
    return {
      status: 400,
      body: {
        message: 'Invalid settings',
        error: error.message,
        type: error.type,
      },
    }
  }
  return {
    status: 500,
    body: {
      message: 'The assistant failed to answer',
      error: errorMessage(error),
      type: isStorageAgentError(error) ? error.type : 'InternalError',
    },
  }
}

// One directory per message, so a later attachment never replaces an earlier one
async function saveAttachment(
  sessionUploadDir: string,
  attachment: Attachment
): Promise<string> {
  const directory = path.join(sessionUploadDir, nanoid())
  const filePath = path.join(directory, attachment.name)
  await mkdir(directory, { recursive: true })
  await writeFile(filePath, Buffer.from(attachment.contentBase64, 'base64'))
  return filePath
}

export function createApp({ sessions, logger }: AppDependencies): Express {
  const app = express()
  app.use(express.json({ limit: REQUEST_BODY_LIMIT }))

  app.use((req, res, next) => {
    const start = Date.now()
    res.on('finish', () => {
      logger.info(
        `[HTTP] ${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`
      )
    })
    next()
  })

  app.get('/', (_req, res) => {
    res.sendFile(INDEX_HTML)
  })

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  app.post(
    '/api/sessions',
    asyncHandler(async (req, res) => {
      const { settings } = parseBody(CreateSessionBodySchema, req.body)
      const session = await sessions.create(settings)
      res.status(201).json({ sessionId: session.id })
    })
  )

  app.post(
    '/api/sessions/:id/messages',
    asyncHandler(async (req, res) => {
      sessions.get(req.params.id)
      const { query, attachment } = parseBody(MessageBodySchema, req.body)

      const { session, response } = await sessions.runTurn(
        req.params.id,
        async (reserved) => {
          const utterance = attachment
            ? withAttachmentPath(
                query,
                await saveAttachment(sessions.uploadDirFor(reserved.id), attachment)
              )
            : query
          return {
            session: reserved,
            response: await reserved.agent.generate(utterance),
          }
        }
      )

      res.json({
        message: response.text,
        steps: response.steps,
        transcript: toDisplayTranscript(session.agent.getTranscript()),
      })
    })
  )

  app.get(
    '/api/sessions/:id/transcript',
    asyncHandler(async (req, res) => {
      const session = sessions.get(req.params.id)
      res.json({ transcript: toDisplayTranscript(session.agent.getTranscript()) })
    })
  )

  app.put(
    '/api/sessions/:id/settings',
    asyncHandler(async (req, res) => {
      sessions.get(req.params.id)
      const { settings } = parseBody(UpdateSettingsBodySchema, req.body)
      const session = sessions.updateSettings(req.params.id, settings)
      res.json({
        sessionId: session.id,
        transcript: toDisplayTranscript(session.agent.getTranscript()),
      })
    })
  )

  app.delete(
    '/api/sessions/:id',
    asyncHandler(async (req, res) => {
      await sessions.delete(req.params.id)
      res.status(204).end()
    })
  )

  app.use(
    (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const { status, body } = toHttpError(error)
      if (status >= 500) {
        logger.error(
          `[HTTP] ${req.method} ${req.path} failed: ${errorMessage(error)}`
        )
      }
      res.status(status).json(body)
    }
  )

  return app
}
