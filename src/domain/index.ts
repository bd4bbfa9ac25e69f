/**
 * Domain model exports.
 */

export * from './audit';
export * from './enrollment';
export * from './errors';
export * from './job';
export * from './organization';
export * from './rbac';
