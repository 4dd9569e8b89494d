export * from './src/constants';
export * from './src/context';
export * from './src/errors';
export * from './src/interfaces';
export * from './src/node/request-listener';
export * from './src/options';
export * from './src/path';
export * from './src/request';
export * from './src/response';
export * from './src/route';
export * from './src/route-table';
export * from './src/router';
export * from './src/types';
export * from './src/variables';
