export * from './webhook-result.enum';
export * from './insert-outcome.enum';
