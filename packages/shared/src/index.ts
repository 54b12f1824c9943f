export const name = '@constify/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './config/schema';
