export * from './types';
export * from './metrics';
export * from './discrete';
export * from './quadratic';
export * from './strategy';
export * from './updater';
export * from './validation';
export * from './defaults';
export * from './store';
export * from './engine';
export * from './bootstrap';
