export * from './decorators';
export * from './http-client';
export * from './interceptors';
export * from './proxy';
export * from './utils';
