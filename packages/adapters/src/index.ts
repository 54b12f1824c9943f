export const name = '@constify/adapters';

export * from './types';
export * from './adapter';
export * from './common';
export * from './factory';
export * from './openai';
export * from './fake/adapter';
