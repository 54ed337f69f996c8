import {
  formatDiagnostic,
  severityOf,
  type DiagnosticSink,
  type MigrationDiagnostic,
} from '@fieldport/migration';
import type { Logger } from './logger.js';

function stageOf(diagnostic: MigrationDiagnostic): string {
  if (diagnostic.kind === 'stage-complete') return diagnostic.stage;
  return diagnostic.kind.startsWith('field') ? 'fields' : 'mappings';
}

/**
 * Write each diagnostic as one log line: skips at warn, creates and summaries at info
 */
export function createLoggerDiagnosticSink(logger: Logger): DiagnosticSink {
  return {
    report(diagnostic) {
      logger.log(severityOf(diagnostic), formatDiagnostic(diagnostic), {
        stage: stageOf(diagnostic),
        kind: diagnostic.kind,
      });
    },
  };
}
