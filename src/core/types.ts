/**
 * Core types for the message relay service
 */

export enum MessageStatus {
  UNREAD = 'unread',
  READ = 'read'
}

export interface Message {
  id: string;
  recipient: string;   // Free-form addressing key (email, username, phone)
  content: string;
  sender: string | null;
  status: MessageStatus;
  timestamp: Date;
  sequence: number;    // Insertion order, used as the sort key
}

export interface MessagePage {
  messages: Message[];
  total: number;
}

export interface DeleteManyResult {
  deletedCount: number;
  deletedIds: string[];
}

export interface StoreStats {
  recipientCount: number;
  totalMessages: number;
  readCount: number;
  unreadCount: number;
  perRecipientCounts: Record<string, number>;
}

export interface MemoryStorageConfig {
  type: 'memory';
  maxPageSize?: number;
}

/**
 * Tagged storage selection. New backends add a variant here.
 */
export type StorageConfig = MemoryStorageConfig;
