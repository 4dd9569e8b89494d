export * from './src/async-storage';
export * from './src/interfaces';
export * from './src/logger';
export * from './src/transports/console';
export * from './src/types';
