import {
  DEFAULTS,
  describeConfig,
  loadConfig,
  requireDesiredStatePath,
  requireServiceConfig,
} from '../src/config';
import { ConfigError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      service: undefined,
      desiredStatePath: undefined,
      reportDir: DEFAULTS.reportDir,
      logLevel: LogLevel.Info,
      logFile: undefined,
      actorId: DEFAULTS.actorId,
      port: DEFAULTS.port,
    });
  });

  test('reads the service settings from the environment', () => {
    const config = loadConfig({
      BAMBOO_URL: 'https://bamboo.example.test',
      BAMBOO_USER: 'admin',
      BAMBOO_PASSWORD: 'test-secret',
      BAMBOO_TIMEOUT_MS: '5000',
      BAMBOO_PAGE_SIZE: '25',
      RECONCILER_DESIRED_STATE: 'access.yaml',
      RECONCILER_LOG_LEVEL: 'DEBUG',
    });

    expect(config.service).toEqual({
      baseUrl: 'https://bamboo.example.test',
      username: 'admin',
      password: 'test-secret',
      token: undefined,
      timeoutMs: 5000,
      pageSize: 25,
    });
    expect(config.desiredStatePath).toBe('access.yaml');
    expect(config.logLevel).toBe(LogLevel.Debug);
  });

  test('flags win over variables', () => {
    const config = loadConfig(
      { BAMBOO_URL: 'https://old.example.test', RECONCILER_REPORT_DIR: 'old', PORT: '8080' },
      { bambooUrl: 'https://new.example.test', reportDir: 'new', port: '9090', actor: 'ops' },
    );
    expect(config.service?.baseUrl).toBe('https://new.example.test');
    expect(config.reportDir).toBe('new');
    expect(config.port).toBe(9090);
    expect(config.actorId).toBe('ops');
  });

  test('blank values count as unset', () => {
    const config = loadConfig({ BAMBOO_URL: '  ', RECONCILER_ACTOR: '' });
    expect(config.service).toBeUndefined();
    expect(config.actorId).toBe(DEFAULTS.actorId);
  });

  test('collects every invalid value', () => {
    const problems = problemsOf(() =>
      loadConfig({
        BAMBOO_URL: 'ftp://bamboo.example.test',
        BAMBOO_PASSWORD: 'test-secret',
        BAMBOO_TIMEOUT_MS: '0',
        BAMBOO_PAGE_SIZE: 'lots',
        RECONCILER_LOG_LEVEL: 'loud',
        PORT: '70000',
      }),
    );

    expect(problems).toEqual([
      'log level must be one of debug, info, warn, error, got "loud"',
      'PORT must be an integer between 0 and 65535, got "70000"',
      'BAMBOO_TIMEOUT_MS must be an integer between 1 and 600000, got "0"',
      'BAMBOO_PAGE_SIZE must be an integer between 1 and 10000, got "lots"',
      'BAMBOO_URL must be an http(s) URL, got "ftp://bamboo.example.test"',
      'BAMBOO_PASSWORD is set without BAMBOO_USER',
    ]);
  });
});

describe('required settings', () => {
  test('requireServiceConfig names the missing URL', () => {
    expect(() => requireServiceConfig(loadConfig({}))).toThrow(
      'Invalid configuration: BAMBOO_URL (or --bamboo-url) is required',
    );
  });

  test('requireDesiredStatePath names the missing document', () => {
    expect(() => requireDesiredStatePath(loadConfig({}))).toThrow(
      'Invalid configuration: RECONCILER_DESIRED_STATE (or --desired) is required',
    );
    expect(requireDesiredStatePath(loadConfig({ RECONCILER_DESIRED_STATE: 'access.yaml' }))).toBe('access.yaml');
  });
});

describe('describeConfig', () => {
  test('masks credentials', () => {
    const description = describeConfig(
      loadConfig({ BAMBOO_URL: 'https://bamboo.example.test', BAMBOO_TOKEN: 'test-token-value' }),
    );
    expect(description.token).toBe('************alue');
    expect(description.password).toBeUndefined();
    expect(description.baseUrl).toBe('https://bamboo.example.test');
  });
});
