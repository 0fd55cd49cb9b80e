/**
 * Common types shared by the pipeline and the storage adapters
 */

/**
 * A payload that passed validation, ready to be stored
 */
export interface ValidMessage {
  messageId: string;
  from: string;
  to: string;
  ts: string;
  text: string | null;
}

/**
 * Message list filter - every field narrows the result
 */
export interface MessageFilter {
  /**
   * Exact sender number
   */
  from?: string;

  /**
   * Inclusive lower bound on `ts`, normalized UTC ISO string
   */
  since?: string;

  /**
   * Case-insensitive substring of `text`
   */
  q?: string;
}

/**
 * Offset pagination
 */
export interface PageRequest {
  limit: number;
  offset: number;
}

/**
 * One page of results plus the size of the full match set
 */
export interface PaginatedResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export interface SenderCount {
  from: string;
  count: number;
}

/**
 * Aggregates computed over the stored messages
 */
export interface MessageStats {
  totalMessages: number;
  uniqueSenderCount: number;
  topSenders: SenderCount[];
  firstMessageTs: string | null;
  lastMessageTs: string | null;
}

export const DEFAULT_PAGE: Readonly<PageRequest> = Object.freeze({
  limit: 50,
  offset: 0,
});

export const MAX_PAGE_LIMIT = 100;

export const TOP_SENDERS_LIMIT = 10;
