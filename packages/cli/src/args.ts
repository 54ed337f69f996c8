/**
 * Command-line arguments of `fieldport`
 */

export type CliArgs =
  | { kind: 'run'; configPath: string; dryRun: boolean }
  | { kind: 'usage'; reason?: string };

export function parseCliArgs(argv: readonly string[]): CliArgs {
  if (argv.includes('--help')) {
    return { kind: 'usage' };
  }

  const configIndex = argv.indexOf('--config');
  if (configIndex === -1) {
    return { kind: 'usage', reason: 'Missing --config' };
  }

  const configPath = argv[configIndex + 1];
  if (configPath === undefined || configPath.startsWith('--')) {
    return { kind: 'usage', reason: '--config needs a file path' };
  }

  return { kind: 'run', configPath, dryRun: argv.includes('--dry-run') };
}
