import { LevelWithSilent, Logger, pino } from 'pino';

import { safelyAccessEnvVar } from './env.js';

// A custom enum definition because pino does not export an enum
// and because we use 'off' instead of 'silent'
export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Off = 'off',
}

export enum LogFormat {
  Pretty = 'pretty',
  JSON = 'json',
}

export function toPinoLevel(level?: string): LevelWithSilent | undefined {
  if (!level) return undefined;
  if (level === 'none' || level === 'off') return 'silent';
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
    case 'silent':
      return level;
    default:
      return undefined;
  }
}

function toLogFormat(format?: string): LogFormat | undefined {
  if (format === LogFormat.Pretty) return LogFormat.Pretty;
  if (format === LogFormat.JSON) return LogFormat.JSON;
  return undefined;
}

let logLevel: LevelWithSilent =
  toPinoLevel(safelyAccessEnvVar('LOG_LEVEL', true)) || 'info';

let logFormat: LogFormat =
  toLogFormat(safelyAccessEnvVar('LOG_FORMAT', true)) || LogFormat.JSON;

// Note, for brevity and convenience, the rootLogger is exported directly
export let rootLogger = createSubnetWarpLogger(logLevel, logFormat);

export function configureRootLogger(
  newLogFormat: LogFormat,
  newLogLevel: LogLevel,
) {
  logFormat = newLogFormat;
  logLevel = toPinoLevel(newLogLevel) || logLevel;
  rootLogger = createSubnetWarpLogger(logLevel, logFormat);
  return rootLogger;
}

export function setRootLogger(logger: Logger) {
  rootLogger = logger;
  return rootLogger;
}

export function createSubnetWarpLogger(
  level: LevelWithSilent,
  format: LogFormat,
) {
  return pino({
    level,
    name: 'subnet-warp',
    formatters: {
      // Remove pino's default bindings of hostname but keep pid
      bindings: (defaultBindings) => ({ pid: defaultBindings.pid }),
    },
    hooks: {
      logMethod(inputArgs, method, levelValue) {
        // pino-pretty is not meant for production, so when pretty output is
        // requested we bypass pino and write the arguments to the console
        if (
          format === LogFormat.Pretty &&
          levelValue >= pino.levels.values[level]
        ) {
          // eslint-disable-next-line no-console
          console.log(...inputArgs);
          return;
        }
        return method.apply(this, inputArgs);
      },
    },
  });
}
