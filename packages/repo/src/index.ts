export const name = '@constify/repo';

export * from './literals';
export * from './scanner';
