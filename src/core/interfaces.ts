/**
 * Core interfaces for the message relay service
 */

import {
  Message,
  MessagePage,
  DeleteManyResult,
  StoreStats
} from './types.js';

/**
 * Interface for message storage backends.
 *
 * Every operation is atomic with respect to every other operation on the
 * same store. Returned messages are copies; mutating them has no effect on
 * stored state.
 */
export interface IMessageStore {
  create(recipient: string, content: string, sender?: string | null): Promise<Message>;

  getMessage(id: string): Promise<Message>;

  // Ascending insertion order, no status change
  listAll(start: number, limit: number): Promise<MessagePage>;
  listByRecipient(recipient: string, start: number, limit: number): Promise<MessagePage>;

  /**
   * Returns every unread message for the recipient and marks them read in
   * the same critical section. A message is handed out at most once.
   */
  fetchUnread(recipient: string): Promise<MessagePage>;

  deleteOne(id: string): Promise<boolean>;
  deleteMany(ids: Iterable<string>): Promise<DeleteManyResult>;

  listRecipients(): Promise<string[]>;
  stats(): Promise<StoreStats>;

  clear(): Promise<void>;
}
