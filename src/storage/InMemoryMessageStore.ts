/**
 * In-memory message store
 * Keeps every message in process memory behind a single exclusive lock
 */

import { v4 as uuidv4 } from 'uuid';
import { IMessageStore } from '../core/interfaces.js';
import {
  Message,
  MessagePage,
  MessageStatus,
  DeleteManyResult,
  StoreStats
} from '../core/types.js';
import { InternalError, NotFoundError, ValidationError } from '../core/errors.js';
import { createMessage, normalizeRecipient, snapshotMessage } from '../models/message.js';
import { ExclusiveLock } from '../utils/lock.js';
import { Logger } from '../utils/Logger.js';

export const DEFAULT_MAX_PAGE_SIZE = 500;

export class InMemoryMessageStore implements IMessageStore {
  private readonly lock = new ExclusiveLock();
  // Map iteration order is insertion order, which is also sequence order
  private messages: Map<string, Message> = new Map();
  private recipientIndex: Map<string, string[]> = new Map();
  private nextSequence = 0;

  constructor(
    private logger: Logger,
    private config: {
      maxPageSize?: number;
      generateId?: () => string;
    } = {}
  ) {}

  private get maxPageSize(): number {
    return this.config.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
  }

  public create(recipient: string, content: string, sender?: string | null): Promise<Message> {
    return this.lock.runExclusive(() => {
      const id = (this.config.generateId ?? uuidv4)();
      const message = createMessage({
        id,
        recipient,
        content,
        sender,
        timestamp: new Date(),
        sequence: this.nextSequence
      });

      if (this.messages.has(id)) {
        throw new InternalError(`Message id collision: ${id}`);
      }

      this.nextSequence++;
      this.messages.set(id, message);
      const ids = this.recipientIndex.get(message.recipient);
      if (ids) {
        ids.push(id);
      } else {
        this.recipientIndex.set(message.recipient, [id]);
      }

      this.logger.debug(`Created message ${id} for recipient ${message.recipient}`);
      return snapshotMessage(message);
    });
  }

  public getMessage(id: string): Promise<Message> {
    return this.lock.runExclusive(() => {
      const message = this.messages.get(id);
      if (!message) {
        throw new NotFoundError(`Message ${id} not found`);
      }
      return snapshotMessage(message);
    });
  }

  public listAll(start: number, limit: number): Promise<MessagePage> {
    return this.lock.runExclusive(() => {
      this.validatePage(start, limit);
      const all = Array.from(this.messages.values());
      const page = all.slice(start, start + limit).map(snapshotMessage);

      this.logger.debug(`Listed ${page.length} messages`, { start, limit });
      return { messages: page, total: all.length };
    });
  }

  public listByRecipient(recipient: string, start: number, limit: number): Promise<MessagePage> {
    return this.lock.runExclusive(() => {
      this.validatePage(start, limit);
      const ids = this.recipientIndex.get(normalizeRecipient(recipient)) ?? [];
      const page = ids
        .slice(start, start + limit)
        .map((id) => snapshotMessage(this.requireMessage(id)));

      this.logger.debug(`Listed ${page.length} messages for recipient ${recipient}`, { start, limit });
      return { messages: page, total: ids.length };
    });
  }

  public fetchUnread(recipient: string): Promise<MessagePage> {
    return this.lock.runExclusive(() => {
      const ids = this.recipientIndex.get(normalizeRecipient(recipient)) ?? [];
      const unread = ids
        .map((id) => this.requireMessage(id))
        .filter((message) => message.status === MessageStatus.UNREAD);

      for (const message of unread) {
        message.status = MessageStatus.READ;
      }

      this.logger.debug(`Fetched ${unread.length} unread messages for recipient ${recipient}`);
      return { messages: unread.map(snapshotMessage), total: unread.length };
    });
  }

  public deleteOne(id: string): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const deleted = this.remove(id);
      if (deleted) {
        this.logger.debug(`Deleted message ${id}`);
      }
      return deleted;
    });
  }

  public deleteMany(ids: Iterable<string>): Promise<DeleteManyResult> {
    const requested = Array.from(ids);
    return this.lock.runExclusive(() => {
      const deletedIds: string[] = [];

      for (const id of requested) {
        if (this.remove(id)) {
          deletedIds.push(id);
        } else if (!deletedIds.includes(id)) {
          this.logger.warn(`Message ${id} not found during bulk delete`);
        }
      }

      this.logger.debug(`Deleted ${deletedIds.length} out of ${requested.length} messages`);
      return { deletedCount: deletedIds.length, deletedIds };
    });
  }

  public listRecipients(): Promise<string[]> {
    return this.lock.runExclusive(() => Array.from(this.recipientIndex.keys()));
  }

  public stats(): Promise<StoreStats> {
    return this.lock.runExclusive(() => {
      let readCount = 0;
      let unreadCount = 0;
      for (const message of this.messages.values()) {
        if (message.status === MessageStatus.READ) {
          readCount++;
        } else {
          unreadCount++;
        }
      }

      // Own properties, so a recipient such as "__proto__" is counted too
      const perRecipientCounts: Record<string, number> = Object.fromEntries(
        Array.from(this.recipientIndex, ([recipient, ids]) => [recipient, ids.length])
      );

      return {
        recipientCount: this.recipientIndex.size,
        totalMessages: this.messages.size,
        readCount,
        unreadCount,
        perRecipientCounts
      };
    });
  }

  public clear(): Promise<void> {
    return this.lock.runExclusive(() => {
      this.messages.clear();
      this.recipientIndex.clear();
      this.logger.info('Cleared all stored messages');
    });
  }

  private validatePage(start: number, limit: number): void {
    if (!Number.isInteger(start) || start < 0) {
      throw new ValidationError('start must be a non-negative integer', { start });
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxPageSize) {
      throw new ValidationError(`limit must be an integer between 1 and ${this.maxPageSize}`, { limit });
    }
  }

  private requireMessage(id: string): Message {
    const message = this.messages.get(id);
    if (!message) {
      throw new InternalError(`Recipient index references missing message ${id}`);
    }
    return message;
  }

  private remove(id: string): boolean {
    const message = this.messages.get(id);
    if (!message) {
      return false;
    }

    this.messages.delete(id);
    const ids = this.recipientIndex.get(message.recipient);
    if (ids) {
      const remaining = ids.filter((existing) => existing !== id);
      if (remaining.length > 0) {
        this.recipientIndex.set(message.recipient, remaining);
      } else {
        this.recipientIndex.delete(message.recipient);
      }
    }
    return true;
  }
}
