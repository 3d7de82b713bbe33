export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function formatTime(): string {
  return new Date().toISOString().slice(11, 23);
}

// Everything goes to stderr: stdout belongs to the MCP stdio transport and to `query` output.
function log(level: LogLevel, scope: string | null, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

  const color = LEVEL_COLORS[level];
  const tag = scope ? ` ${DIM}${scope}${RESET}` : '';
  const prefix = `${color}${BOLD}[${formatTime()}] ${level.toUpperCase().padEnd(5)}${RESET}${tag}`;

  if (args.length > 0) {
    console.error(prefix, message, ...args);
  } else {
    console.error(prefix, message);
  }
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  progress(current: number, total: number, label: string): void;
  child(scope: string): Logger;
}

function createLogger(scope: string | null): Logger {
  return {
    debug: (msg, ...args) => log('debug', scope, msg, args),
    info: (msg, ...args) => log('info', scope, msg, args),
    warn: (msg, ...args) => log('warn', scope, msg, args),
    error: (msg, ...args) => log('error', scope, msg, args),

    progress: (current, total, label) => {
      if (LEVEL_ORDER.info < LEVEL_ORDER[currentLevel] || total <= 0) return;
      const pct = Math.round((current / total) * 100);
      const bar = '█'.repeat(Math.floor(pct / 5)) + '░'.repeat(20 - Math.floor(pct / 5));
      process.stderr.write(`\r\x1b[36m${bar} ${pct}% ${label}\x1b[0m`);
      if (current === total) process.stderr.write('\n');
    },

    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger: Logger = createLogger(null);
