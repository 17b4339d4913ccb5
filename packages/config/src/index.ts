export { ConfigError } from './errors.js';
export {
  loadEnv,
  parseExecutor,
  parseLogLevel,
  parseNodeEnv,
  parsePositiveInt,
  MIN_WINDOW_BYTES,
  type EnvOverrides,
  type EnvSource,
  type Executor,
  type LogLevel,
  type NodeEnv,
} from './env.js';
export {
  ConfigFileSchema,
  DEFAULT_CONFIG_FILE,
  loadConfigFile,
  type ConfigFileInput,
  type LoadConfigFileParams,
  type LoadedConfigFile,
} from './config-file.js';
export {
  DEFAULT_INPUT_FILE,
  DEFAULT_WINDOW_BYTES,
  defaultWorkerCount,
  resolveConfig,
  type ConfigOverrides,
  type TypeStatsConfig,
} from './resolve.js';
