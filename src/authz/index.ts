export * from './entity-graph';
export * from './permission-resolver';
export * from './access-grants';
