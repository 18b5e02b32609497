export * from './exceptions';
export * from './filters';
export * from './http-client';
export * from './interceptors';
export * from './proxy';
export * from './utils/currency.util';
