export { MemoryMessageStore, MemoryStoreOptions } from './memory-message.store';
