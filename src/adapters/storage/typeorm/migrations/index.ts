import { CreateMessagesTable1736935200000 } from './1736935200000-CreateMessagesTable';

/**
 * Migrations in the order they run
 */
export const MESSAGE_MIGRATIONS = [CreateMessagesTable1736935200000];

export { CreateMessagesTable1736935200000 };
