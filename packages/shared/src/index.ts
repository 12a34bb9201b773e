export * from './errors';
export * from './failureMessages';
export * from './limits';
export * from './logger';
