#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   fieldport --config ./fieldport.json [--dry-run]
 */

import { ConnectorError } from '@fieldport/core';
import { formatMigrationReport, MigrationError } from '@fieldport/migration';
import { parseCliArgs } from './args.js';
import { loadConfig } from './config.js';
import { Logger } from './logger.js';
import { createOrgServices, runMigration } from './run.js';

const EXAMPLE_CONFIG = {
  environment: 'prod',
  source: { orgId: 'legacy-org', accessToken: '${V1_ACCESS_TOKEN}' },
  target: { orgId: 'new-org', accessToken: '${V2_ACCESS_TOKEN}' },
  dryRun: false,
};

function printUsage(): void {
  console.error('Usage: fieldport --config <config.json> [--dry-run]');
  console.error('');
  console.error('Copies user-defined fields and their mappings from a V1 to a V2 organization.');
  console.error('');
  console.error('Example config.json:');
  console.error(JSON.stringify(EXAMPLE_CONFIG, null, 2));
}

function describeError(error: unknown): string {
  if (error instanceof ConnectorError || error instanceof MigrationError) {
    return error.toActionableMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = parseCliArgs(process.argv.slice(2));

  if (args.kind === 'usage') {
    if (args.reason) {
      console.error(args.reason);
      console.error('');
    }
    printUsage();
    process.exit(1);
  }

  try {
    const config = await loadConfig(args.configPath);
    if (args.dryRun) {
      config.dryRun = true;
    }

    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });

    const report = await runMigration(config, createOrgServices(config, logger), logger);
    process.stdout.write(`${formatMigrationReport(report)}\n`);
  } catch (error) {
    logger.error(`Migration aborted. ${describeError(error)}`, { error });
    process.exit(1);
  }
}

void main();
