// Interface and type exports
export * from './common.types';
export * from './errors';
export * from './message-store';
export * from './pagination';
