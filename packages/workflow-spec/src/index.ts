export * from './types';
export * from './schemas';
export * from './plan';
export * from './messages';
export * from './logger';
