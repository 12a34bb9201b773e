import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ConfigError, loadConfig } from './config';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'notekeep-config-test-'));
}

describe('loadConfig', () => {
  it('falls back to defaults without env or config file', () => {
    const cwd = createTempDir();

    expect(loadConfig(cwd, {})).toEqual({
      dataDir: path.join(cwd, 'data'),
      dbPath: path.join(cwd, 'data', 'notes.db'),
      scratchpadPath: path.join(cwd, 'data', 'scratchpad.json'),
      busyTimeoutMs: 5000,
      logLevel: 'info',
    });
  });

  it('loads JSON config from the working directory', () => {
    const cwd = createTempDir();
    const configPath = path.join(cwd, 'notekeep.config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({ dataDir: 'notes', busyTimeoutMs: 250, logLevel: 'debug' }),
      'utf8',
    );

    const config = loadConfig(cwd, {});

    expect(config.dataDir).toBe(path.join(cwd, 'notes'));
    expect(config.busyTimeoutMs).toBe(250);
    expect(config.logLevel).toBe('debug');
    expect(config.configPath).toBe(configPath);
  });

  it('loads YAML config', () => {
    const cwd = createTempDir();
    fs.writeFileSync(
      path.join(cwd, 'notekeep.config.yaml'),
      'dataDir: store\nlogLevel: warn\n',
      'utf8',
    );

    const config = loadConfig(cwd, {});

    expect(config.dataDir).toBe(path.join(cwd, 'store'));
    expect(config.logLevel).toBe('warn');
    expect(config.busyTimeoutMs).toBe(5000);
  });

  it('treats an empty YAML file as no settings', () => {
    const cwd = createTempDir();
    const configPath = path.join(cwd, 'notekeep.config.yml');
    fs.writeFileSync(configPath, '', 'utf8');

    const config = loadConfig(cwd, {});

    expect(config.dataDir).toBe(path.join(cwd, 'data'));
    expect(config.configPath).toBe(configPath);
  });

  it('prefers environment variables over the config file', () => {
    const cwd = createTempDir();
    const envDataDir = path.join(createTempDir(), 'env-data');
    fs.writeFileSync(
      path.join(cwd, 'notekeep.config.json'),
      JSON.stringify({ dataDir: 'file-data', busyTimeoutMs: 250, logLevel: 'debug' }),
      'utf8',
    );

    const config = loadConfig(cwd, {
      NOTEKEEP_DATA_DIR: envDataDir,
      NOTEKEEP_BUSY_TIMEOUT_MS: '1200',
      NOTEKEEP_LOG_LEVEL: 'ERROR',
    });

    expect(config.dataDir).toBe(envDataDir);
    expect(config.busyTimeoutMs).toBe(1200);
    expect(config.logLevel).toBe('error');
  });

  it('ignores blank environment variables', () => {
    const cwd = createTempDir();

    const config = loadConfig(cwd, { NOTEKEEP_DATA_DIR: '  ', NOTEKEEP_LOG_LEVEL: '' });

    expect(config.dataDir).toBe(path.join(cwd, 'data'));
    expect(config.logLevel).toBe('info');
  });

  it('rejects unknown keys in the config file', () => {
    const cwd = createTempDir();
    fs.writeFileSync(path.join(cwd, 'notekeep.config.json'), '{"dataDirectory": "x"}', 'utf8');

    expect(() => loadConfig(cwd, {})).toThrow(ConfigError);
  });

  it('rejects malformed config files', () => {
    const cwd = createTempDir();
    fs.writeFileSync(path.join(cwd, 'notekeep.config.json'), '{"dataDir": ', 'utf8');

    expect(() => loadConfig(cwd, {})).toThrow(/^Failed to parse /);
  });

  it('rejects non-numeric busy timeouts from the environment', () => {
    const cwd = createTempDir();

    expect(() => loadConfig(cwd, { NOTEKEEP_BUSY_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid environment: NOTEKEEP_BUSY_TIMEOUT_MS: must be a non-negative integer',
    );
  });

  it('rejects busy timeouts the database driver cannot take', () => {
    const cwd = createTempDir();

    expect(() => loadConfig(cwd, { NOTEKEEP_BUSY_TIMEOUT_MS: '2147483648' })).toThrow(
      'Invalid environment: NOTEKEEP_BUSY_TIMEOUT_MS: must be at most 2147483647',
    );
    expect(loadConfig(cwd, { NOTEKEEP_BUSY_TIMEOUT_MS: '2147483647' }).busyTimeoutMs).toBe(
      2147483647,
    );

    const configPath = path.join(cwd, 'notekeep.config.json');
    fs.writeFileSync(configPath, JSON.stringify({ busyTimeoutMs: 3000000000 }), 'utf8');
    expect(() => loadConfig(cwd, {})).toThrow(
      `Invalid config in ${configPath}: busyTimeoutMs: must be at most 2147483647`,
    );
  });
});
