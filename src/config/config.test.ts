import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { DEFAULT_BASE_URL, isHeaderSafeToken, isValidTimeout, loadConfig } from './config.js';

const dir = mkdtempSync(join(tmpdir(), 'bonusly-config-'));

function envFile(name: string, contents: string): string {
  const path = join(dir, name);
  writeFileSync(path, contents);
  return path;
}

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('applies defaults around a token', () => {
    const [err, config] = loadConfig({ env: { BONUSLY_TOKEN: 'test-secret' }, envFile: false });

    expect(err).toBeNull();
    expect(config).toEqual({
      token: 'test-secret',
      baseUrl: DEFAULT_BASE_URL,
      timeout: 5000,
      compression: true,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads and converts every variable', () => {
    const [err, config] = loadConfig({
      env: {
        BONUSLY_TOKEN: 'test-secret',
        BONUSLY_BASE_URL: 'http://localhost:3000/api/v1',
        BONUSLY_TIMEOUT_MS: '250',
        BONUSLY_COMPRESSION: '0',
      },
      envFile: false,
    });

    expect(err).toBeNull();
    expect(config).toEqual({
      token: 'test-secret',
      baseUrl: 'http://localhost:3000/api/v1',
      timeout: 250,
      compression: false,
    });
  });

  it('falls back to the settings file for variables missing from the environment', () => {
    const path = envFile('fallback.env', 'BONUSLY_TOKEN=file-secret\nBONUSLY_TIMEOUT_MS=900\n');

    const [err, config] = loadConfig({ env: { BONUSLY_TIMEOUT_MS: '100' }, envFile: path });

    expect(err).toBeNull();
    expect(config?.token).toBe('file-secret');
    expect(config?.timeout).toBe(100);
  });

  it('lets overrides win over every source', () => {
    const path = envFile('override.env', 'BONUSLY_TOKEN=file-secret\n');

    const [err, config] = loadConfig({
      env: { BONUSLY_TOKEN: 'env-secret', BONUSLY_COMPRESSION: 'true' },
      envFile: path,
      overrides: { token: 'test-secret', compression: false },
    });

    expect(err).toBeNull();
    expect(config?.token).toBe('test-secret');
    expect(config?.compression).toBe(false);
  });

  it('ignores a settings file that does not exist', () => {
    const [err, config] = loadConfig({
      env: { BONUSLY_TOKEN: 'test-secret' },
      envFile: join(dir, 'missing.env'),
    });

    expect(err).toBeNull();
    expect(config?.token).toBe('test-secret');
  });

  it('reports a missing token', () => {
    const [err, config] = loadConfig({ env: {}, envFile: false });

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err?.message).toBe('error invalid configuration BONUSLY_TOKEN: is required');
    expect(err?.setting).toBe('BONUSLY_TOKEN');
  });

  it.each([
    [{ BONUSLY_TOKEN: '' }, 'error invalid configuration BONUSLY_TOKEN: is required'],
    [
      { BONUSLY_TOKEN: 'test secret' },
      'error invalid configuration BONUSLY_TOKEN: must be printable ASCII without whitespace',
    ],
    [
      { BONUSLY_TOKEN: 'test-secret', BONUSLY_BASE_URL: 'bonus.ly' },
      'error invalid configuration BONUSLY_BASE_URL: must be an absolute URL',
    ],
    [
      { BONUSLY_TOKEN: 'test-secret', BONUSLY_TIMEOUT_MS: '-5' },
      'error invalid configuration BONUSLY_TIMEOUT_MS: must be a positive number of milliseconds',
    ],
    [
      { BONUSLY_TOKEN: 'test-secret', BONUSLY_COMPRESSION: 'yes' },
      'error invalid configuration BONUSLY_COMPRESSION: Invalid input',
    ],
    [
      { BONUSLY_TOKEN: 'test-secret', BONUSLY_TIMEOUT_MS: '3000000000' },
      'error invalid configuration BONUSLY_TIMEOUT_MS: must be at most 2147483647 milliseconds',
    ],
  ])('rejects %j', (env, message) => {
    const [err] = loadConfig({ env, envFile: false });

    expect(err?.message).toBe(message);
  });

  it('accepts the longest timeout a timer can hold', () => {
    const [err, config] = loadConfig({
      env: { BONUSLY_TOKEN: 'test-secret', BONUSLY_TIMEOUT_MS: '2147483647' },
      envFile: false,
    });

    expect(err).toBeNull();
    expect(config?.timeout).toBe(2147483647);
  });

  it('never puts the token into the error', () => {
    const [err] = loadConfig({ env: { BONUSLY_TOKEN: 'test secret' }, envFile: false });

    expect(err?.message).not.toContain('test secret');
  });
});

describe('isValidTimeout', () => {
  it('accepts false and whole milliseconds a timer can hold', () => {
    expect(isValidTimeout(false)).toBe(true);
    expect(isValidTimeout(1)).toBe(true);
    expect(isValidTimeout(2147483647)).toBe(true);
    expect(isValidTimeout(0)).toBe(false);
    expect(isValidTimeout(-1)).toBe(false);
    expect(isValidTimeout(1.5)).toBe(false);
    expect(isValidTimeout(2147483648)).toBe(false);
  });
});

describe('isHeaderSafeToken', () => {
  it('accepts printable ascii only', () => {
    expect(isHeaderSafeToken('test-secret')).toBe(true);
    expect(isHeaderSafeToken('')).toBe(false);
    expect(isHeaderSafeToken('line\nbreak')).toBe(false);
    expect(isHeaderSafeToken('café')).toBe(false);
  });
});
