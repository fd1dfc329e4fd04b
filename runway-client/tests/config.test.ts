import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { loadDotenv, loadRuntimeConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadRuntimeConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({
      RUNWAYML_API_SECRET: undefined,
      RUNWAYML_BASE_URL: 'https://api.runwayml.com/v1',
      RUNWAYML_POLL_INTERVAL_SECONDS: 5,
      RUNWAYML_TIMEOUT_SECONDS: 300,
      LOG_LEVEL: 'info'
    });
  });

  it('coerces numeric settings', () => {
    const config = loadRuntimeConfig({
      RUNWAYML_API_SECRET: 'test-secret',
      RUNWAYML_POLL_INTERVAL_SECONDS: '2.5',
      RUNWAYML_TIMEOUT_SECONDS: '60'
    });

    expect(config.RUNWAYML_API_SECRET).toBe('test-secret');
    expect(config.RUNWAYML_POLL_INTERVAL_SECONDS).toBe(2.5);
    expect(config.RUNWAYML_TIMEOUT_SECONDS).toBe(60);
  });

  it('treats a blank secret as absent', () => {
    expect(loadRuntimeConfig({ RUNWAYML_API_SECRET: '   ' }).RUNWAYML_API_SECRET).toBeUndefined();
  });

  it('reports invalid fields as a ConfigurationError', () => {
    expect(() => loadRuntimeConfig({ RUNWAYML_BASE_URL: 'not a url' })).toThrow(ConfigurationError);
    expect(() => loadRuntimeConfig({ RUNWAYML_TIMEOUT_SECONDS: '-1' })).toThrow(/RUNWAYML_TIMEOUT_SECONDS/);
  });
});

describe('loadDotenv', () => {
  let dir: string;
  const previousSecret = process.env.RUNWAYML_API_SECRET;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runway-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    if (previousSecret === undefined) {
      delete process.env.RUNWAYML_API_SECRET;
    } else {
      process.env.RUNWAYML_API_SECRET = previousSecret;
    }
  });

  it('loads the first file that exists', async () => {
    const envPath = join(dir, '.env');
    await writeFile(envPath, 'RUNWAYML_API_SECRET=test-secret-from-file\n');

    const loaded = loadDotenv([join(dir, 'missing.env'), envPath]);

    expect(loaded).toBe(envPath);
    expect(process.env.RUNWAYML_API_SECRET).toBe('test-secret-from-file');
  });

  it('resolves the default paths from the current directory at call time', async () => {
    const packageDir = join(dir, 'package');
    await mkdir(packageDir);
    await writeFile(join(dir, '.env'), 'RUNWAYML_API_SECRET=test-secret-from-parent\n');
    const previousCwd = process.cwd();

    try {
      process.chdir(packageDir);
      const expected = resolve(process.cwd(), '../.env');

      expect(loadDotenv()).toBe(expected);
      expect(process.env.RUNWAYML_API_SECRET).toBe('test-secret-from-parent');
    } finally {
      process.chdir(previousCwd);
    }
  });

  it('returns null when no file exists', () => {
    expect(loadDotenv([join(dir, 'missing.env')])).toBeNull();
  });
});
