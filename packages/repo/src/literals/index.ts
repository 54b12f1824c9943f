export * from './types';
export * from './scanner';
