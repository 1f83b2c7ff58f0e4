/**
 * @rowgate/cli
 *
 * Config loading and the end-to-end load job
 */

export { main, parseCliArgs } from './cli.js';
export type { CliArgs } from './cli.js';
export { runJob } from './job.js';
export type { JobDeps, JobOptions, JobStore } from './job.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  tableSourcePaths,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions, SourcesConfig } from './config.js';
