import pino from 'pino';
import type { Logger } from 'pino';
import { LOG_FORMATS, LOG_LEVELS } from './config.js';
import type { AppConfig, LogFormat, LogLevel } from './config.js';

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

/** TASKLANE_LOG and TASKLANE_LOG_FORMAT win over the config file; unknown values are ignored */
export function resolveLogConfig(
  config: Pick<AppConfig, 'log'> | undefined,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedLogConfig {
  const envLevel = env.TASKLANE_LOG;
  const envFormat = env.TASKLANE_LOG_FORMAT;

  const level: LogLevel = isLogLevel(envLevel) ? envLevel : config?.log.level ?? 'info';
  const format: LogFormat = isLogFormat(envFormat) ? envFormat : config?.log.format ?? 'pretty';

  return { level, format };
}

export function createRootLogger(config: Pick<AppConfig, 'log'> | undefined): Logger {
  const resolved = resolveLogConfig(config);

  const transport =
    resolved.format === 'pretty'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined;

  return pino({
    level: resolved.level,
    transport,
  });
}

/** A logger that writes nothing. For tests */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
