import { createAppContext } from '../src/app';
import { createConfig } from '../src/config';
import { HttpEnrollmentProvider } from '../src/downstream/http-provider';
import { MemoryEnrollmentProvider } from '../src/downstream/memory-provider';
import { LogEntry, LogLevel, resetLogHandler, setLogHandler } from '../src/logger';

describe('createAppContext', () => {
  let logs: LogEntry[];

  beforeEach(() => {
    logs = [];
    setLogHandler((entry) => logs.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
  });

  test('refuses to start without an enrollment system unless the in-process provider is chosen', () => {
    expect(() => createAppContext(createConfig())).toThrow(
      'Invalid configuration: lms.baseUrl, lms.clientId and lms.clientSecret are required when enrollmentProvider is "http"',
    );
  });

  test('builds the HTTP provider from the enrollment system settings', () => {
    const app = createAppContext(
      createConfig({
        lms: { baseUrl: 'https://lms.example.com', clientId: 'registrar-worker', clientSecret: 'test-secret' },
      }),
    );

    expect(app.provider).toBeInstanceOf(HttpEnrollmentProvider);
    expect(logs.filter((e) => e.level === LogLevel.Warn)).toEqual([]);
  });

  test('the in-process provider is used only when chosen, with a warning', () => {
    const app = createAppContext(createConfig({ enrollmentProvider: 'memory' }));

    expect(app.provider).toBeInstanceOf(MemoryEnrollmentProvider);
    expect(logs.filter((e) => e.level === LogLevel.Warn).map((e) => e.message)).toEqual([
      'Using the in-process enrollment provider; writes never leave this process',
    ]);
  });
});
