/**
 * Injection tokens for the inbox module
 */

export const MESSAGE_STORE = Symbol('MESSAGE_STORE');
export const METRICS_REGISTRY = Symbol('METRICS_REGISTRY');
export const INGESTION_PIPELINE = Symbol('INGESTION_PIPELINE');
export const INBOX_CONFIG = Symbol('INBOX_CONFIG');
