import { Message } from '../domain/models';
import { InsertOutcome } from '../domain/enums';
import {
  ValidMessage,
  MessageFilter,
  PageRequest,
  PaginatedResult,
  MessageStats,
} from './common.types';

/**
 * Message store - abstracts all message persistence
 *
 * Every method rejects with StorageUnavailableError when the backing store
 * cannot be reached; list() rejects with InvalidPageError on bad pages.
 */
export interface MessageStore {
  /**
   * Write a message once. Uniqueness of `messageId` must be enforced by the
   * storage engine itself; a violation is reported as ALREADY_EXISTS and the
   * stored row is left untouched.
   */
  insert(message: ValidMessage): Promise<InsertOutcome>;

  /**
   * Filtered page ordered by (ts ASC, messageId ASC)
   */
  list(
    filter: MessageFilter,
    page?: Partial<PageRequest>,
  ): Promise<PaginatedResult<Message>>;

  /**
   * Aggregate statistics over all stored messages
   */
  stats(): Promise<MessageStats>;

  /**
   * Check that the store is reachable and its schema is in place.
   * Resolves false instead of rejecting.
   */
  ping(): Promise<boolean>;

  /**
   * Release connections
   */
  close(): Promise<void>;
}
