/**
 * Unit tests for config.ts and env-loader.ts
 * cms.yaml loading, defaults, environment overrides and .env cascading
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { applyEnvOverrides, loadEngineConfig, validateConfig } from '../../src/config.js';
import { findProjectRoot, loadEnvFiles } from '../../src/env-loader.js';
import { ContentValidationError } from '../../src/errors.js';

describe('config.ts - loadEngineConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `cms-config-test-${uuidv4()}`);
    await fs.mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    try {
      await fs.rm(tempDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should use defaults when there is no cms.yaml', async () => {
    const loaded = await loadEngineConfig(tempDir, { env: {} });

    expect(loaded.configFile).toBeNull();
    expect(loaded.config).toEqual({ cache: { max_entries: 500 }, log_level: 'info' });
  });

  it('should read cms.yaml', async () => {
    await fs.writeFile(
      path.join(tempDir, 'cms.yaml'),
      `cache:
  max_entries: 50
  max_bytes: 1048576
log_level: debug
`,
      'utf-8'
    );

    const loaded = await loadEngineConfig(tempDir, { env: {} });

    expect(loaded.configFile).toBe(path.join(tempDir, 'cms.yaml'));
    expect(loaded.config).toEqual({ cache: { max_entries: 50, max_bytes: 1048576 }, log_level: 'debug' });
  });

  it('should treat an empty cms.yaml as defaults', async () => {
    await fs.writeFile(path.join(tempDir, 'cms.yaml'), '', 'utf-8');

    const loaded = await loadEngineConfig(tempDir, { env: {} });

    expect(loaded.config.cache.max_entries).toBe(500);
  });

  it('should let environment variables override cms.yaml', async () => {
    await fs.writeFile(path.join(tempDir, 'cms.yaml'), 'cache:\n  max_entries: 50\nlog_level: debug\n', 'utf-8');

    const loaded = await loadEngineConfig(tempDir, {
      env: { CMS_CACHE_MAX_ENTRIES: '20', CMS_CACHE_MAX_BYTES: '4096', CMS_LOG_LEVEL: 'warn' },
    });

    expect(loaded.config).toEqual({ cache: { max_entries: 20, max_bytes: 4096 }, log_level: 'warn' });
  });

  it('should list every invalid field', async () => {
    await fs.writeFile(path.join(tempDir, 'cms.yaml'), 'cache:\n  max_entries: -1\nlog_level: loud\n', 'utf-8');

    const error = await loadEngineConfig(tempDir, { env: {} }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ContentValidationError);
    expect(error).toMatchObject({ file: path.join(tempDir, 'cms.yaml') });
    if (!(error instanceof Error)) throw new Error('expected an error');
    expect(error.message).toContain('Configuration validation failed:');
    expect(error.message).toContain('  - cache.max_entries: ');
    expect(error.message).toContain('  - log_level: ');
  });

  it('should reject YAML that is not a mapping', async () => {
    await fs.writeFile(path.join(tempDir, 'cms.yaml'), '- just\n- a list\n', 'utf-8');

    await expect(loadEngineConfig(tempDir, { env: {} })).rejects.toThrow('cms.yaml must contain a mapping');
  });

  it('should reject YAML that does not parse', async () => {
    await fs.writeFile(path.join(tempDir, 'cms.yaml'), 'cache: [unclosed\n', 'utf-8');

    await expect(loadEngineConfig(tempDir, { env: {} })).rejects.toThrow('Failed to parse cms.yaml');
  });
});

describe('config.ts - overrides', () => {
  it('should reject a non-numeric override', () => {
    expect(() => applyEnvOverrides({}, { CMS_CACHE_MAX_ENTRIES: 'lots' })).toThrow(
      'CMS_CACHE_MAX_ENTRIES must be a positive integer, got: lots'
    );
  });

  it('should leave the raw config alone when no override is set', () => {
    const raw = { cache: { max_entries: 5 } };

    expect(applyEnvOverrides(raw, {})).toEqual({ cache: { max_entries: 5 } });
    expect(validateConfig(applyEnvOverrides(raw, {})).cache.max_entries).toBe(5);
  });
});

describe('env-loader.ts', () => {
  let tempDir: string;
  const variable = `CMS_TEST_${uuidv4().replace(/-/g, '_').toUpperCase()}`;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `cms-env-test-${uuidv4()}`);
    await fs.mkdir(path.join(tempDir, '.git'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'content'), { recursive: true });
  });

  afterEach(async () => {
    delete process.env[variable];
    try {
      await fs.rm(tempDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should find the project root by its .git directory', () => {
    expect(findProjectRoot(path.join(tempDir, 'content'))).toBe(tempDir);
  });

  it('should prefer the content directory .env over the project root', async () => {
    await fs.writeFile(path.join(tempDir, 'content', '.env'), `${variable}=content\n`, 'utf-8');
    await fs.writeFile(path.join(tempDir, '.env'), `${variable}=root\n`, 'utf-8');

    const loaded = loadEnvFiles(path.join(tempDir, 'content'), path.join(tempDir, 'content'));

    expect(loaded).toEqual([path.join(tempDir, 'content', '.env'), path.join(tempDir, '.env')]);
    expect(process.env[variable]).toBe('content');
  });

  it('should not override variables that are already set', async () => {
    process.env[variable] = 'shell';
    await fs.writeFile(path.join(tempDir, 'content', '.env'), `${variable}=content\n`, 'utf-8');

    loadEnvFiles(path.join(tempDir, 'content'), tempDir);

    expect(process.env[variable]).toBe('shell');
  });
});
