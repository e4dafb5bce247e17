import { Router } from 'express'
import type { Logger } from 'pino'
import type { IMessageStore } from '../core/interfaces.js'
import { ValidationError } from '../core/errors.js'
import {
  deleteManyQuerySchema,
  messageIdSchema,
  paginationQuerySchema,
  sendMessageSchema,
  normalizeRecipient,
  toMessageResponse
} from '../models/message.js'

export interface MessagesRouterOptions {
  defaultPageSize: number
  logger: Logger
}

export function createMessagesRouter(store: IMessageStore, options: MessagesRouterOptions): Router {
  const router = Router()
  const { logger } = options
  const pageQuerySchema = paginationQuerySchema(options.defaultPageSize)

  router.get('/messages', async (req, res, next) => {
    const parse = pageQuerySchema.safeParse(req.query)
    if (!parse.success) {
      return next(ValidationError.fromIssues(parse.error.issues))
    }
    try {
      const { start, limit } = parse.data
      const page = await store.listAll(start, limit)
      logger.info({ start, limit, count: page.messages.length }, 'Retrieved messages')
      res.json({
        messages: page.messages.map(toMessageResponse),
        total: page.total,
        start,
        limit
      })
    } catch (err) {
      next(err)
    }
  })

  // Registered before /messages/:recipient so "new" is not taken as a recipient
  router.get('/messages/new/:recipient', async (req, res, next) => {
    const recipient = normalizeRecipient(req.params.recipient)
    try {
      const page = await store.fetchUnread(recipient)
      logger.info({ recipient, count: page.total }, 'Retrieved new messages')
      res.json({
        messages: page.messages.map(toMessageResponse),
        total: page.total,
        recipient
      })
    } catch (err) {
      next(err)
    }
  })

  router.get('/messages/:recipient', async (req, res, next) => {
    const recipient = normalizeRecipient(req.params.recipient)
    const parse = pageQuerySchema.safeParse(req.query)
    if (!parse.success) {
      return next(ValidationError.fromIssues(parse.error.issues))
    }
    try {
      const { start, limit } = parse.data
      const page = await store.listByRecipient(recipient, start, limit)
      logger.info({ recipient, start, limit, count: page.messages.length }, 'Retrieved messages for recipient')
      res.json({
        messages: page.messages.map(toMessageResponse),
        total: page.total,
        recipient,
        start,
        limit
      })
    } catch (err) {
      next(err)
    }
  })

  router.post('/messages', async (req, res, next) => {
    const parse = sendMessageSchema.safeParse(req.body)
    if (!parse.success) {
      return next(ValidationError.fromIssues(parse.error.issues))
    }
    try {
      const message = await store.create(parse.data.recipient, parse.data.content, parse.data.sender)
      logger.info({ messageId: message.id, recipient: message.recipient }, 'Message created')
      res.status(201).json(toMessageResponse(message))
    } catch (err) {
      next(err)
    }
  })

  router.delete('/messages', async (req, res, next) => {
    const parse = deleteManyQuerySchema.safeParse(req.query)
    if (!parse.success) {
      return next(ValidationError.fromIssues(parse.error.issues))
    }
    try {
      const result = await store.deleteMany(parse.data.message_ids)
      logger.info({ requested: parse.data.message_ids.length, deleted: result.deletedCount }, 'Deleted messages')
      res.json({
        deleted_count: result.deletedCount,
        message_ids: result.deletedIds,
        timestamp: new Date().toISOString()
      })
    } catch (err) {
      next(err)
    }
  })

  router.delete('/messages/:messageId', async (req, res, next) => {
    const parse = messageIdSchema.safeParse(req.params.messageId)
    if (!parse.success) {
      return next(ValidationError.fromIssues(parse.error.issues))
    }
    try {
      const deleted = await store.deleteOne(parse.data)
      logger.info({ messageId: parse.data, deleted }, 'Delete message')
      res.json({
        deleted_count: deleted ? 1 : 0,
        message_ids: deleted ? [parse.data] : [],
        timestamp: new Date().toISOString()
      })
    } catch (err) {
      next(err)
    }
  })

  return router
}
