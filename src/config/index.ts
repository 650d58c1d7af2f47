/**
 * Configuration Module
 * @module config
 */

export {
  RunConfigurationSchema,
  ReportConfigurationSchema,
  DURATION_PATTERN,
  parseDuration,
  toGeneratorDuration,
  type RunConfiguration,
  type RunConfigurationInput,
  type ReportConfiguration,
} from './schema.js';

export {
  BENCH_APP_ENTRY,
  defaultServerCommand,
  readEnvironment,
  readArgs,
  loadRunConfiguration,
  loadReportConfiguration,
} from './loader.js';
