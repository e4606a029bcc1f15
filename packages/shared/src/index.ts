export * from './schemas';
export * from './format';
export * from './errors';
export * from './logger';
