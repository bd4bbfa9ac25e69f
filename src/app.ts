/**
 * Application wiring: builds every service from a validated config.
 */

import { RegistrarApi } from './api/registrar-api';
import { AuditService } from './audit/audit-service';
import { AccessGrantService, SubjectDirectory } from './authz/access-grants';
import { EntityGraph } from './authz/entity-graph';
import { PermissionResolver } from './authz/permission-resolver';
import { RegistrarConfig, validateConfig } from './config';
import { RegistrarError, configError } from './domain/errors';
import { checkPermissionMapping } from './domain/rbac';
import { HttpEnrollmentProvider } from './downstream/http-provider';
import { MemoryEnrollmentProvider } from './downstream/memory-provider';
import { EnrollmentProvider } from './downstream/provider';
import { JobExecutor } from './engine/executor';
import { JobHandlerRegistry } from './engine/job-handlers';
import { JobRegistry } from './engine/job-registry';
import { defaultJobHandlers } from './engine/handlers';
import { logger, setLogLevel } from './logger';
import { createResultStore } from './storage/factory';
import { createMemoryStore } from './storage/memory-store';
import { ResultStore } from './storage/result-store';
import { Store } from './storage/store';

export interface AppContextOptions {
  store?: Store;
  provider?: EnrollmentProvider;
  resultStore?: ResultStore;
}

export interface AppContext {
  config: RegistrarConfig;
  store: Store;
  graph: EntityGraph;
  resolver: PermissionResolver;
  grants: AccessGrantService;
  subjects: SubjectDirectory;
  audit: AuditService;
  resultStore: ResultStore;
  provider: EnrollmentProvider;
  handlers: JobHandlerRegistry;
  registry: JobRegistry;
  executor: JobExecutor;
  api: RegistrarApi;
}

/** Fail startup when the role or permission tables are incomplete. */
export function assertPermissionMappingComplete(): void {
  const problems = checkPermissionMapping();
  if (problems.length > 0) {
    logger.fatal('Permission mapping is incomplete', { problems });
    throw new RegistrarError(configError(problems));
  }
}

export function createAppContext(config: RegistrarConfig, options: AppContextOptions = {}): AppContext {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new RegistrarError(configError(validation.errors));
  }
  assertPermissionMappingComplete();
  setLogLevel(config.logLevel);

  const store = options.store ?? createMemoryStore();
  const resultStore = options.resultStore ?? createResultStore(config);
  const provider = options.provider ?? createProvider(config);

  const audit = new AuditService(store);
  const graph = new EntityGraph(store);
  const resolver = new PermissionResolver(store, graph, {
    enrollmentDisabledProgramTypes: config.enrollmentDisabledProgramTypes,
  });
  const grants = new AccessGrantService(store, graph, resolver, audit);
  const subjects = new SubjectDirectory(store);
  const handlers = new JobHandlerRegistry(defaultJobHandlers());
  const registry = new JobRegistry(store, resolver, audit);
  const executor = new JobExecutor(
    { registry, graph, resultStore, provider, handlers },
    {
      concurrency: config.jobConcurrency,
      timeoutMs: config.jobTimeoutMs,
      writeBatchSize: config.writeBatchSize,
    },
  );
  const api = new RegistrarApi({ graph, resolver, registry, executor, handlers, resultStore, audit });

  logger.info('Registrar initialized', {
    resultStore: resultStore.backend,
    provider: options.provider ? 'injected' : config.enrollmentProvider,
    concurrency: config.jobConcurrency,
  });

  return { config, store, graph, resolver, grants, subjects, audit, resultStore, provider, handlers, registry, executor, api };
}

function createProvider(config: RegistrarConfig): EnrollmentProvider {
  if (config.enrollmentProvider === 'memory') {
    logger.warn('Using the in-process enrollment provider; writes never leave this process');
    return new MemoryEnrollmentProvider();
  }
  const { baseUrl = '', clientId = '', clientSecret = '' } = config.lms;
  return new HttpEnrollmentProvider({ baseUrl, clientId, clientSecret });
}
