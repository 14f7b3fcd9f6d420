export * from './common';
export * from './metadata';
