export const name = '@constify/core';

export * from './config/loader';
export * from './commit/writer';
export * from './pipeline';
