export * from './pipeline';
export * from './results';
export * from './retry';
export * from './task';
export * from './validation';
