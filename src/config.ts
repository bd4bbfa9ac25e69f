/**
 * Registrar configuration.
 *
 * Usage:
 *   const config = loadConfig();            // from process.env
 *   const config = createConfig({ enrollmentProvider: 'memory', jobConcurrency: 2 });
 *
 *   const result = validateConfig(config);
 *   if (!result.valid) console.error(result.errors);
 */

import { configError, RegistrarError } from './domain/errors';
import { ProgramType, isProgramType } from './domain/organization';
import { LogLevel, parseLogLevel } from './logger';

export type ResultStoreDriver = 'filesystem' | 's3';

/** `memory` keeps enrollments in process and must be chosen explicitly. */
export type EnrollmentProviderDriver = 'http' | 'memory';

export interface S3Config {
  bucket?: string;
  region: string;
  /** Key prefix under which job results are written. */
  prefix: string;
  /** Custom endpoint for S3-compatible storage (path-style addressing is used). */
  endpoint?: string;
}

/** Downstream enrollment system connection. */
export interface LmsConfig {
  baseUrl?: string;
  clientId?: string;
  clientSecret?: string;
}

export interface RegistrarConfig {
  resultStore: ResultStoreDriver;
  /** Root directory of the filesystem result store. */
  resultDir: string;
  s3: S3Config;
  /** Lifetime of generated result URLs. */
  resultUrlTtlSeconds: number;
  jobConcurrency: number;
  jobTimeoutMs: number;
  writeBatchSize: number;
  enrollmentProvider: EnrollmentProviderDriver;
  lms: LmsConfig;
  /** Program types on which enrollment data cannot be read or written. */
  enrollmentDisabledProgramTypes: ProgramType[];
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/** Create a config with defaults. */
export function createConfig(overrides?: Partial<RegistrarConfig>): RegistrarConfig {
  return {
    resultStore: 'filesystem',
    resultDir: './var',
    resultUrlTtlSeconds: 300,
    jobConcurrency: 4,
    jobTimeoutMs: 900_000,
    writeBatchSize: 25,
    enrollmentProvider: 'http',
    enrollmentDisabledProgramTypes: [],
    logLevel: LogLevel.Info,
    ...overrides,
    s3: {
      region: 'us-east-1',
      prefix: '',
      ...overrides?.s3,
    },
    lms: { ...overrides?.lms },
  };
}

/** Validate a configuration for consistency. */
export function validateConfig(config: RegistrarConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (config.resultStore !== 'filesystem' && config.resultStore !== 's3') {
    errors.push(`resultStore must be "filesystem" or "s3", got "${String(config.resultStore)}"`);
  }
  if (config.resultStore === 's3' && !config.s3.bucket) {
    errors.push('s3.bucket is required when resultStore is "s3"');
  }
  if (config.resultStore === 'filesystem' && !config.resultDir) {
    errors.push('resultDir is required when resultStore is "filesystem"');
  }
  if (!Number.isInteger(config.resultUrlTtlSeconds) || config.resultUrlTtlSeconds < 1) {
    errors.push('resultUrlTtlSeconds must be a positive integer');
  }
  // Presigned URLs cannot outlive seven days.
  if (config.resultUrlTtlSeconds > 604_800) {
    errors.push('resultUrlTtlSeconds cannot exceed 604800');
  }
  if (!Number.isInteger(config.jobConcurrency) || config.jobConcurrency < 1) {
    errors.push('jobConcurrency must be at least 1');
  }
  if (!Number.isInteger(config.jobTimeoutMs) || config.jobTimeoutMs < 1) {
    errors.push('jobTimeoutMs must be a positive integer');
  }
  if (!Number.isInteger(config.writeBatchSize) || config.writeBatchSize < 1) {
    errors.push('writeBatchSize must be at least 1');
  }
  if (config.enrollmentProvider !== 'http' && config.enrollmentProvider !== 'memory') {
    errors.push(`enrollmentProvider must be "http" or "memory", got "${String(config.enrollmentProvider)}"`);
  }
  if (config.lms.baseUrl !== undefined && !isHttpUrl(config.lms.baseUrl)) {
    errors.push(`lms.baseUrl is not an http(s) URL: ${config.lms.baseUrl}`);
  }
  if (
    config.enrollmentProvider === 'http' &&
    (!config.lms.baseUrl || !config.lms.clientId || !config.lms.clientSecret)
  ) {
    errors.push('lms.baseUrl, lms.clientId and lms.clientSecret are required when enrollmentProvider is "http"');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Read REGISTRAR_* variables, apply defaults and validate.
 * Throws a RegistrarError (CONFIG.INVALID) when the result is unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistrarConfig {
  const errors: string[] = [];

  const intVar = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      errors.push(`${name} must be an integer, got "${raw}"`);
      return undefined;
    }
    return value;
  };
  const strVar = (name: string): string | undefined => {
    const raw = env[name];
    return raw === undefined || raw === '' ? undefined : raw;
  };

  let resultStore: ResultStoreDriver | undefined;
  const driver = strVar('REGISTRAR_RESULT_STORE');
  if (driver === 'filesystem' || driver === 's3') {
    resultStore = driver;
  } else if (driver !== undefined) {
    errors.push(`REGISTRAR_RESULT_STORE must be "filesystem" or "s3", got "${driver}"`);
  }

  let enrollmentProvider: EnrollmentProviderDriver | undefined;
  const providerDriver = strVar('REGISTRAR_ENROLLMENT_PROVIDER');
  if (providerDriver === 'http' || providerDriver === 'memory') {
    enrollmentProvider = providerDriver;
  } else if (providerDriver !== undefined) {
    errors.push(`REGISTRAR_ENROLLMENT_PROVIDER must be "http" or "memory", got "${providerDriver}"`);
  }

  const disabledTypes: ProgramType[] = [];
  for (const entry of (strVar('REGISTRAR_ENROLLMENT_DISABLED_PROGRAM_TYPES') ?? '').split(',')) {
    const value = entry.trim().toLowerCase();
    if (!value) continue;
    if (isProgramType(value)) {
      disabledTypes.push(value);
    } else {
      errors.push(`REGISTRAR_ENROLLMENT_DISABLED_PROGRAM_TYPES contains unknown program type "${value}"`);
    }
  }

  const overrides: Partial<RegistrarConfig> = {
    resultStore,
    resultDir: strVar('REGISTRAR_RESULT_DIR'),
    resultUrlTtlSeconds: intVar('REGISTRAR_RESULT_URL_TTL_SECONDS'),
    jobConcurrency: intVar('REGISTRAR_JOB_CONCURRENCY'),
    jobTimeoutMs: intVar('REGISTRAR_JOB_TIMEOUT_MS'),
    writeBatchSize: intVar('REGISTRAR_WRITE_BATCH_SIZE'),
    enrollmentProvider,
    enrollmentDisabledProgramTypes: disabledTypes,
    logLevel: parseLogLevel(strVar('REGISTRAR_LOG_LEVEL')),
    s3: {
      bucket: strVar('REGISTRAR_S3_BUCKET'),
      region: strVar('REGISTRAR_S3_REGION') ?? 'us-east-1',
      prefix: strVar('REGISTRAR_S3_PREFIX') ?? '',
      endpoint: strVar('REGISTRAR_S3_ENDPOINT'),
    },
    lms: {
      baseUrl: strVar('REGISTRAR_LMS_BASE_URL'),
      clientId: strVar('REGISTRAR_LMS_CLIENT_ID'),
      clientSecret: strVar('REGISTRAR_LMS_CLIENT_SECRET'),
    },
  };

  const config = createConfig(withoutUndefined(overrides));
  errors.push(...validateConfig(config).errors);
  if (errors.length > 0) {
    throw new RegistrarError(configError(errors));
  }
  return config;
}

function withoutUndefined(overrides: Partial<RegistrarConfig>): Partial<RegistrarConfig> {
  const result: Partial<RegistrarConfig> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
