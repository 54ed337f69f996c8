import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, expandEnvVars, loadConfig, parseConfig } from '../src/index.js';

const env = { V1_TOKEN: 'test-v1-token', V2_TOKEN: 'test-v2-token' };

const minimal = {
  source: { orgId: 'legacy', accessToken: '${V1_TOKEN}' },
  target: { orgId: 'fresh', accessToken: '${V2_TOKEN}' },
};

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('expandEnvVars', () => {
  it('expands nested strings and falls back to defaults', () => {
    expect(
      expandEnvVars({ a: ['${V1_TOKEN}'], b: { c: '${MISSING:-fallback}' }, d: 3 }, { env })
    ).toEqual({ a: ['test-v1-token'], b: { c: 'fallback' }, d: 3 });
  });

  it('fails on a missing variable without default', () => {
    expect(() => expandEnvVars('${NOPE}', { env })).toThrow(
      new ConfigError('Missing environment variables:\n- NOPE (top level)')
    );
  });

  it('lists every missing variable with the key that uses it', () => {
    expect(() =>
      expandEnvVars({ target: { accessToken: '${V3_TOKEN}' }, hosts: ['${NOPE}'] }, { env })
    ).toThrow('Missing environment variables:\n- V3_TOKEN (target.accessToken)\n- NOPE (hosts.0)');
  });

  it('keeps an empty fallback', () => {
    expect(expandEnvVars('x${EMPTY:-}y', { env })).toBe('xy');
  });
});

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig(minimal, { env });

    expect(config).toEqual({
      environment: 'prod',
      source: { orgId: 'legacy', accessToken: 'test-v1-token' },
      target: { orgId: 'fresh', accessToken: 'test-v2-token' },
      dryRun: false,
      rebuildSources: false,
    });
  });

  it('reports every invalid path', () => {
    expect(() =>
      parseConfig({ ...minimal, environment: 'staging', source: { orgId: 'legacy' } }, { env })
    ).toThrow(
      "Invalid config file:\n- environment: Invalid enum value. Expected 'dev' | 'qa' | 'prod', received 'staging'\n- source.accessToken: Required"
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ ...minimal, dryrun: true }, { env })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  it('reads a JSON file with a byte order mark', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'fieldport-config-'));
    const filePath = join(tmpDir, 'config.json');
    writeFileSync(filePath, `\uFEFF${JSON.stringify({ ...minimal, dryRun: true })}`);

    const config = await loadConfig(filePath, { env });

    expect(config.dryRun).toBe(true);
    expect(config.target.accessToken).toBe('test-v2-token');
  });

  it('wraps JSON syntax errors in ConfigError', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'fieldport-config-'));
    const filePath = join(tmpDir, 'config.json');
    writeFileSync(filePath, '{ not json');

    await expect(loadConfig(filePath, { env })).rejects.toBeInstanceOf(ConfigError);
  });
});
