import { Router } from 'express'
import type { Logger } from 'pino'
import type { IMessageStore } from '../core/interfaces.js'

export function createRecipientsRouter(store: IMessageStore, logger: Logger): Router {
  const router = Router()

  router.get('/recipients', async (_req, res, next) => {
    try {
      const recipients = await store.listRecipients()
      logger.debug({ count: recipients.length }, 'Listed recipients')
      res.json(recipients)
    } catch (err) {
      next(err)
    }
  })

  router.get('/stats', async (_req, res, next) => {
    try {
      const stats = await store.stats()
      res.json({
        total_messages: stats.totalMessages,
        total_recipients: stats.recipientCount,
        total_read: stats.readCount,
        total_unread: stats.unreadCount,
        messages_per_recipient: stats.perRecipientCounts,
        timestamp: new Date().toISOString()
      })
    } catch (err) {
      next(err)
    }
  })

  return router
}
