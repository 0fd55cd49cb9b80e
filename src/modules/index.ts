/**
 * NestJS modules
 */

export * from './inbox';
