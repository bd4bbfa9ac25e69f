/**
 * Enrollment Registrar: scoped authorization for partner organizations
 * and asynchronous bulk enrollment jobs.
 *
 * Library entry point. The request-handling layer builds an AppContext
 * and calls the RegistrarApi facade.
 */

export { createAppContext, assertPermissionMappingComplete } from './app';
export type { AppContext, AppContextOptions } from './app';
export { RegistrarApi } from './api/registrar-api';
export type { RegistrarApiDeps } from './api/registrar-api';
export * from './config';
export * from './logger';
export * from './domain';
export * from './authz';
export * from './audit';
export * from './engine';
export * from './storage';
export * from './downstream';
