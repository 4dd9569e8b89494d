export * from './clean-path';
