export * from './payload-validator';
export * from './inbound-message';
export { normalizeZonedTimestamp } from './timestamp';
