/**
 * What an idempotent insert did. Both values are successes.
 */
export enum InsertOutcome {
  CREATED = 'created',
  ALREADY_EXISTS = 'already_exists',
}
