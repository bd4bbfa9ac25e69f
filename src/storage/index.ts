export * from './store';
export * from './memory-store';
export * from './result-store';
export * from './filesystem-result-store';
export * from './s3-result-store';
export * from './factory';
