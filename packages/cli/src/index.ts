/**
 * @fieldport/cli
 *
 * Config loading, logging and the run entry used by the `fieldport` command
 */

export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LogStream, LoggerOptions } from './logger.js';

export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';

export { parseCliArgs } from './args.js';
export type { CliArgs } from './args.js';

export { createLoggerDiagnosticSink } from './diagnostic-sink.js';
export { createOrgServices, runMigration } from './run.js';
export type { OrgServices } from './run.js';
