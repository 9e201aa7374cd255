import process from 'node:process';
import { c } from './lib/colors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  isVerbose: () => boolean;
  setLevel: (next: LogLevel) => void;
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/** Level named by `GITPORT_LOG_LEVEL`, else `debug` under `DEBUG=gitport`, else `info`. */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.GITPORT_LOG_LEVEL?.toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  if (env.DEBUG === '*' || env.DEBUG?.includes('gitport')) {
    return 'debug';
  }
  return 'info';
}

// One level shared by every logger so `-v` / `-q` reach the provider clients too.
let level = resolveLevel();

export function createLogger(scope?: string): Logger {
  const prefix = scope ? `${scope}: ` : '';

  return {
    debug(message: string) {
      if (LEVELS[level] <= LEVELS.debug) {
        process.stderr.write(`${c.dim('[debug]')} ${prefix}${message}\n`);
      }
    },
    info(message: string) {
      if (LEVELS[level] <= LEVELS.info) {
        process.stdout.write(`${message}\n`);
      }
    },
    warn(message: string) {
      if (LEVELS[level] <= LEVELS.warn) {
        process.stderr.write(`${c.warn('[warn]')} ${message}\n`);
      }
    },
    error(message: string) {
      process.stderr.write(`${c.error('[error]')} ${message}\n`);
    },
    isVerbose() {
      return LEVELS[level] <= LEVELS.debug;
    },
    setLevel(next: LogLevel) {
      level = next;
    },
  };
}
