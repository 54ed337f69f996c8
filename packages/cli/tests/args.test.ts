import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../src/index.js';

describe('parseCliArgs', () => {
  it('reads the config path and the dry-run flag', () => {
    expect(parseCliArgs(['--config', './fieldport.json', '--dry-run'])).toEqual({
      kind: 'run',
      configPath: './fieldport.json',
      dryRun: true,
    });
  });

  it('runs for real unless --dry-run is given', () => {
    expect(parseCliArgs(['--config', 'a.json'])).toEqual({
      kind: 'run',
      configPath: 'a.json',
      dryRun: false,
    });
  });

  it('does not take the next flag as the config path', () => {
    expect(parseCliArgs(['--config', '--dry-run'])).toEqual({
      kind: 'usage',
      reason: '--config needs a file path',
    });
  });

  it('asks for usage when --config has no value', () => {
    expect(parseCliArgs(['--dry-run', '--config'])).toEqual({
      kind: 'usage',
      reason: '--config needs a file path',
    });
  });

  it('asks for usage without --config', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'usage', reason: 'Missing --config' });
  });

  it('prints usage on --help', () => {
    expect(parseCliArgs(['--config', 'a.json', '--help'])).toEqual({ kind: 'usage' });
  });
});
