import { CloudV1Client, CloudV2Client, type ReadRetryEvent } from '@fieldport/connector-cloud';
import { createMigrationPipeline, type MigrationReport } from '@fieldport/migration';
import type { ISourceOrgService, ITargetOrgService } from '@fieldport/core';
import type { ConfigFile } from './config.js';
import type { Logger } from './logger.js';
import { createLoggerDiagnosticSink } from './diagnostic-sink.js';

export interface OrgServices {
  source: ISourceOrgService;
  target: ITargetOrgService;
}

/**
 * Build the REST clients for both organizations. Repeated reads are logged as warnings.
 */
export function createOrgServices(config: ConfigFile, logger: Logger): OrgServices {
  const shared = {
    environment: config.environment,
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    onRetry: (event: ReadRetryEvent) => {
      logger.warn(`Retrying GET ${event.path} (attempt ${event.attempt}/${event.attempts})`, {
        org: event.orgLabel,
        delayMs: event.delayMs,
        code: event.error.code,
      });
    },
  };

  return {
    source: new CloudV1Client({ ...shared, ...config.source }),
    target: new CloudV2Client({ ...shared, ...config.target }),
  };
}

/**
 * Run one migration with the given services, reporting every decision through the logger
 */
export async function runMigration(
  config: ConfigFile,
  services: OrgServices,
  logger: Logger
): Promise<MigrationReport> {
  const runLogger = logger.child({
    sourceOrg: config.source.orgId,
    targetOrg: config.target.orgId,
  });

  if (config.dryRun) {
    runLogger.info('Dry run: no field or mapping will be written to the target organization');
  }

  const pipeline = createMigrationPipeline({
    source: services.source,
    target: services.target,
    diagnostics: createLoggerDiagnosticSink(runLogger),
    dryRun: config.dryRun,
    rebuildSources: config.rebuildSources,
  });

  return pipeline.run();
}
