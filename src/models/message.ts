import { z } from 'zod'
import { Message, MessageStatus } from '../core/types.js'
import { ValidationError } from '../core/errors.js'

export const MAX_RECIPIENT_LENGTH = 255
export const MAX_SENDER_LENGTH = 255
export const MAX_CONTENT_LENGTH = 10000
export const MAX_DELETE_IDS = 100

export const sendMessageSchema = z.object({
  recipient: z.string().trim()
    .min(1, 'Recipient cannot be empty')
    .max(MAX_RECIPIENT_LENGTH, `Recipient must be at most ${MAX_RECIPIENT_LENGTH} characters`),
  content: z.string().trim()
    .min(1, 'Message content cannot be empty')
    .max(MAX_CONTENT_LENGTH, `Message content must be at most ${MAX_CONTENT_LENGTH} characters`),
  sender: z.string().trim()
    .max(MAX_SENDER_LENGTH, `Sender must be at most ${MAX_SENDER_LENGTH} characters`)
    .nullish()
    .transform((value) => (value ? value : null))
})

export type SendMessageInput = z.input<typeof sendMessageSchema>

export const messageIdSchema = z.string().uuid('Invalid message id')

const integerParam = (name: string) =>
  z.string().regex(/^-?\d+$/, `${name} must be an integer`).transform(Number)

// Shape only; range checks belong to the store
export const paginationQuerySchema = (defaultLimit: number) => z.object({
  start: integerParam('start').default('0'),
  limit: integerParam('limit').default(String(defaultLimit))
})

export const deleteManyQuerySchema = z.object({
  message_ids: z.preprocess(
    (value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]),
    z.array(messageIdSchema)
      .min(1, 'No message IDs provided')
      .max(MAX_DELETE_IDS, `Too many message IDs (max ${MAX_DELETE_IDS})`)
  )
})

// Lookups use the same key that create stores
export function normalizeRecipient(recipient: string): string {
  return recipient.trim()
}

export interface NewMessage extends SendMessageInput {
  id: string
  timestamp: Date
  sequence: number
}

/**
 * Builds an unread message. Throws ValidationError when recipient or
 * content is empty after trimming or too long.
 */
export function createMessage(input: NewMessage): Message {
  const parse = sendMessageSchema.safeParse(input)
  if (!parse.success) {
    throw ValidationError.fromIssues(parse.error.issues, 'Invalid message')
  }
  return {
    id: input.id,
    recipient: parse.data.recipient,
    content: parse.data.content,
    sender: parse.data.sender,
    status: MessageStatus.UNREAD,
    timestamp: input.timestamp,
    sequence: input.sequence
  }
}

export function snapshotMessage(message: Message): Message {
  return Object.freeze({ ...message, timestamp: new Date(message.timestamp.getTime()) })
}

export interface MessageResponse {
  id: string
  recipient: string
  content: string
  sender: string | null
  timestamp: string
  status: MessageStatus
}

export function toMessageResponse(message: Message): MessageResponse {
  return {
    id: message.id,
    recipient: message.recipient,
    content: message.content,
    sender: message.sender,
    timestamp: message.timestamp.toISOString(),
    status: message.status
  }
}
