export * from './state-machine';
export * from './job-registry';
export * from './job-handlers';
export * from './executor';
export * from './handlers';
