export * from './provider';
export * from './http-provider';
export * from './memory-provider';
