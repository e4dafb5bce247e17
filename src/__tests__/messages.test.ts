import request from 'supertest'
import type express from 'express'
import { describe, it, expect, beforeEach } from '@jest/globals'
import { createApp } from '../app.js'
import { InMemoryMessageStore } from '../storage/InMemoryMessageStore.js'
import { InternalError, NotFoundError } from '../core/errors.js'
import type { StoreStats } from '../core/types.js'
import { Logger } from '../utils/Logger.js'

const MISSING_ID = '00000000-0000-4000-8000-000000000000'
const pagination = { defaultPageSize: 10, maxPageSize: 500 }

describe('Messages API', () => {
  let store: InMemoryMessageStore
  let app: express.Express

  beforeEach(() => {
    store = new InMemoryMessageStore(new Logger('test', { level: 'silent' }))
    app = createApp(store, { pagination })
  })

  async function send(recipient: string, content: string, sender?: string): Promise<string> {
    const response = await request(app)
      .post('/messages')
      .send({ recipient, content, ...(sender ? { sender } : {}) })
      .expect(201)
    return response.body.id
  }

  describe('POST /messages', () => {
    it('should create a message', async () => {
      const response = await request(app)
        .post('/messages')
        .send({ recipient: 'user@example.com', content: 'Hello, world!', sender: 'admin@example.com' })
        .expect(201)

      expect(response.body).toMatchObject({
        recipient: 'user@example.com',
        content: 'Hello, world!',
        sender: 'admin@example.com',
        status: 'unread'
      })
      expect(typeof response.body.id).toBe('string')
      expect(response.body.timestamp).toMatch(/Z$/)
      expect(response.body).not.toHaveProperty('sequence')
    })

    it('should store a message without a sender', async () => {
      const response = await request(app)
        .post('/messages')
        .send({ recipient: 'user', content: 'Hello!' })
        .expect(201)

      expect(response.body.sender).toBeNull()
    })

    it('should reject empty content', async () => {
      const response = await request(app)
        .post('/messages')
        .send({ recipient: 'user@example.com', content: '' })
        .expect(400)

      expect(response.body.success).toBe(false)
      expect(response.body.error).toBe('Message content cannot be empty')
    })

    it('should reject an empty recipient', async () => {
      const response = await request(app)
        .post('/messages')
        .send({ recipient: '', content: 'Hello, world!' })
        .expect(400)

      expect(response.body.error).toBe('Recipient cannot be empty')
    })

    it('should reject a missing recipient', async () => {
      const response = await request(app)
        .post('/messages')
        .send({ content: 'Hello, world!' })
        .expect(400)

      expect(response.body.error).toBe('Required')
      expect(response.body.details[0].path).toEqual(['recipient'])
    })

    it('should reject a malformed JSON body', async () => {
      const response = await request(app)
        .post('/messages')
        .set('Content-Type', 'application/json')
        .send('{"recipient": ')
        .expect(400)

      expect(response.body).toEqual({ success: false, error: 'Malformed JSON body' })
    })
  })

  describe('GET /messages/new/:recipient', () => {
    it('should return new messages marked as read', async () => {
      await send('user@example.com', 'Hello, world!')

      const response = await request(app)
        .get('/messages/new/user@example.com')
        .expect(200)

      expect(response.body.total).toBe(1)
      expect(response.body.recipient).toBe('user@example.com')
      expect(response.body.messages).toHaveLength(1)
      expect(response.body.messages[0].content).toBe('Hello, world!')
      expect(response.body.messages[0].status).toBe('read')
    })

    it('should return nothing on the second fetch', async () => {
      await send('user@example.com', 'Hello, world!')

      await request(app).get('/messages/new/user@example.com').expect(200)
      const second = await request(app)
        .get('/messages/new/user@example.com')
        .expect(200)

      expect(second.body).toEqual({ messages: [], total: 0, recipient: 'user@example.com' })
    })

    it('should return an empty result for an unknown recipient', async () => {
      const response = await request(app)
        .get('/messages/new/nonexistent@example.com')
        .expect(200)

      expect(response.body.total).toBe(0)
    })
  })

  describe('GET /messages', () => {
    it('should page through all messages in creation order', async () => {
      for (let i = 1; i <= 5; i++) {
        await send(i % 2 === 0 ? 'bob' : 'alice', `Message ${i}`)
      }

      const response = await request(app)
        .get('/messages?start=1&limit=2')
        .expect(200)

      expect(response.body.total).toBe(5)
      expect(response.body.start).toBe(1)
      expect(response.body.limit).toBe(2)
      expect(response.body.messages.map((m: { content: string }) => m.content)).toEqual(['Message 2', 'Message 3'])
    })

    it('should use the configured default page size', async () => {
      for (let i = 0; i < 12; i++) {
        await send('bob', `Message ${i}`)
      }

      const response = await request(app)
        .get('/messages')
        .expect(200)

      expect(response.body.limit).toBe(10)
      expect(response.body.start).toBe(0)
      expect(response.body.messages).toHaveLength(10)
      expect(response.body.total).toBe(12)
    })

    it('should return an empty page when start equals the total', async () => {
      await send('bob', 'only')

      const response = await request(app)
        .get('/messages?start=1&limit=10')
        .expect(200)

      expect(response.body.messages).toEqual([])
      expect(response.body.total).toBe(1)
    })

    it('should reject a negative start', async () => {
      const response = await request(app)
        .get('/messages?start=-1')
        .expect(400)

      expect(response.body.error).toBe('start must be a non-negative integer')
    })

    it('should reject a limit above the maximum', async () => {
      const response = await request(app)
        .get('/messages?limit=501')
        .expect(400)

      expect(response.body.error).toBe('limit must be an integer between 1 and 500')
    })

    it('should reject a blank start', async () => {
      const response = await request(app)
        .get('/messages?start=')
        .expect(400)

      expect(response.body.error).toBe('start must be an integer')
    })

    it('should reject a non-numeric limit', async () => {
      await request(app)
        .get('/messages?limit=ten')
        .expect(400)
    })
  })

  describe('GET /messages/:recipient', () => {
    it('should show fetched messages as read in the history', async () => {
      const id = await send('bob', 'hi', 'alice')
      await request(app).get('/messages/new/bob').expect(200)

      const response = await request(app)
        .get('/messages/bob?start=0&limit=10')
        .expect(200)

      expect(response.body.total).toBe(1)
      expect(response.body.recipient).toBe('bob')
      expect(response.body.messages[0]).toMatchObject({ id, sender: 'alice', status: 'read' })
    })

    it('should match a recipient stored with surrounding whitespace', async () => {
      await send(' bob ', 'hi')

      const history = await request(app)
        .get('/messages/%20bob')
        .expect(200)
      const unread = await request(app)
        .get('/messages/new/bob%20')
        .expect(200)

      expect(history.body.recipient).toBe('bob')
      expect(history.body.total).toBe(1)
      expect(unread.body.total).toBe(1)
    })

    it('should count only the recipient messages', async () => {
      await send('bob', 'one')
      await send('alice', 'two')
      await send('bob', 'three')

      const response = await request(app)
        .get('/messages/bob?limit=1')
        .expect(200)

      expect(response.body.total).toBe(2)
      expect(response.body.messages.map((m: { content: string }) => m.content)).toEqual(['one'])
    })
  })

  describe('DELETE /messages/:messageId', () => {
    it('should delete a message once', async () => {
      const id = await send('bob', 'hi')

      const first = await request(app).delete(`/messages/${id}`).expect(200)
      const second = await request(app).delete(`/messages/${id}`).expect(200)

      expect(first.body.deleted_count).toBe(1)
      expect(first.body.message_ids).toEqual([id])
      expect(typeof first.body.timestamp).toBe('string')
      expect(second.body.deleted_count).toBe(0)
      expect(second.body.message_ids).toEqual([])
    })

    it('should reject an id that is not a UUID', async () => {
      const response = await request(app)
        .delete('/messages/not-a-uuid')
        .expect(400)

      expect(response.body.error).toBe('Invalid message id')
    })
  })

  describe('DELETE /messages', () => {
    it('should delete the listed messages and skip missing ids', async () => {
      const a = await send('carol', 'a')
      const c = await send('carol', 'c')

      const response = await request(app)
        .delete(`/messages?message_ids=${a}&message_ids=${MISSING_ID}&message_ids=${c}`)
        .expect(200)

      expect(response.body.deleted_count).toBe(2)
      expect(response.body.message_ids).toEqual([a, c])

      const recipients = await request(app).get('/recipients').expect(200)
      expect(recipients.body).not.toContain('carol')
    })

    it('should accept a single id', async () => {
      const a = await send('bob', 'a')

      const response = await request(app)
        .delete(`/messages?message_ids=${a}`)
        .expect(200)

      expect(response.body.message_ids).toEqual([a])
    })

    it('should require at least one id', async () => {
      const response = await request(app)
        .delete('/messages')
        .expect(400)

      expect(response.body.error).toBe('No message IDs provided')
    })
  })

  describe('GET /recipients', () => {
    it('should list recipients with stored messages', async () => {
      await send('bob', '1')
      await send('alice', '2')
      await send('bob', '3')

      const response = await request(app).get('/recipients').expect(200)

      expect(response.body).toEqual(['bob', 'alice'])
    })
  })

  describe('GET /stats', () => {
    it('should report consistent totals', async () => {
      await send('bob', '1')
      await send('bob', '2')
      await send('alice', '3')
      await request(app).get('/messages/new/bob').expect(200)

      const response = await request(app).get('/stats').expect(200)

      expect(response.body).toMatchObject({
        total_messages: 3,
        total_recipients: 2,
        total_read: 2,
        total_unread: 1,
        messages_per_recipient: { bob: 2, alice: 1 }
      })
      expect(typeof response.body.timestamp).toBe('string')
    })

    it('should include a recipient named __proto__ in the per-recipient counts', async () => {
      await send('__proto__', 'hi')
      await send('bob', 'hi')

      const response = await request(app).get('/stats').expect(200)

      expect(Object.keys(response.body.messages_per_recipient)).toEqual(['__proto__', 'bob'])
      expect(response.body.total_messages).toBe(2)
    })
  })

  describe('store failures', () => {
    class FailingStore extends InMemoryMessageStore {
      constructor(private readonly failure: Error) {
        super(new Logger('test', { level: 'silent' }))
      }

      public override stats(): Promise<StoreStats> {
        return Promise.reject(this.failure)
      }
    }

    it('should map an internal error to a 500 without leaking its message', async () => {
      const failing = createApp(new FailingStore(new InternalError('duplicate id')), { pagination })

      const response = await request(failing).get('/stats').expect(500)

      expect(response.body).toEqual({ success: false, error: 'Internal server error' })
    })

    it('should map a not-found error to a 404', async () => {
      const failing = createApp(new FailingStore(new NotFoundError('Message gone')), { pagination })

      const response = await request(failing).get('/stats').expect(404)

      expect(response.body).toEqual({ success: false, error: 'Message gone' })
    })
  })
})
