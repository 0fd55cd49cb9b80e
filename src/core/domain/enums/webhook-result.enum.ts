/**
 * Outcome of a single webhook ingestion - every request gets exactly one
 */
export enum WebhookResult {
  /**
   * Signature valid, payload valid, new row written
   */
  CREATED = 'created',

  /**
   * Signature valid, payload valid, message_id already stored
   */
  DUPLICATE = 'duplicate',

  /**
   * Signature missing, malformed or not matching the body
   */
  INVALID_SIGNATURE = 'invalid_signature',

  /**
   * Authentic request carrying a malformed payload
   */
  VALIDATION_ERROR = 'validation_error',

  /**
   * Authentic, valid request that could not be written; retryable
   */
  STORAGE_UNAVAILABLE = 'storage_unavailable',
}

/**
 * Results that end the request successfully
 */
export const ACCEPTED_WEBHOOK_RESULTS: ReadonlySet<WebhookResult> = new Set([
  WebhookResult.CREATED,
  WebhookResult.DUPLICATE,
]);
