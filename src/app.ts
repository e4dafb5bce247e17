import express from 'express'
import pino, { type Logger } from 'pino'
import type { IMessageStore } from './core/interfaces.js'
import type { PaginationConfig } from './config.js'
import { createHealthHandler } from './routes/health.js'
import { createMessagesRouter } from './routes/messages.js'
import { createRecipientsRouter } from './routes/recipients.js'
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js'

export interface AppOptions {
  pagination: PaginationConfig
  logger?: Logger
}

/**
 * Builds the HTTP app around an already constructed store. The caller owns
 * the store; the app only holds a reference to it.
 */
export function createApp(store: IMessageStore, options: AppOptions): express.Express {
  const logger = options.logger ?? pino({ level: 'silent' })
  const app = express()

  app.use(express.json())

  app.get('/', createHealthHandler())
  app.use(createMessagesRouter(store, { defaultPageSize: options.pagination.defaultPageSize, logger }))
  app.use(createRecipientsRouter(store, logger))

  app.use(notFoundHandler)
  app.use(createErrorHandler(logger))

  return app
}
