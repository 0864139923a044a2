export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { startServer } from './server.js';
export type { RunningServer, StartServerOptions } from './server.js';
export { createAuthMiddleware, parseBearer } from './auth.js';
export { createErrorHandler } from './errors.js';
export type { ErrorBody } from './errors.js';
export {
  loadConfig,
  findConfigFile,
  parseConfig,
  applyEnvOverrides,
  configSchema,
  ConfigError,
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_FILES,
  LOG_LEVELS,
  LOG_FORMATS,
} from './config.js';
export type { AppConfig, LoadConfigOptions, LoadedConfig, LogLevel, LogFormat } from './config.js';
export {
  resolveLogConfig,
  createRootLogger,
  createSilentLogger,
} from './logger.js';
export type { ResolvedLogConfig } from './logger.js';
export { toWireTask, toWirePage, fromWire, fromWireList, toWireFieldErrors } from './wire.js';
export type { WireTask, WireTaskPage } from './wire.js';
