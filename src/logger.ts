/** Log levels, most verbose first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  logger: string;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  /** Logger name, printed with every entry. */
  name: string;
  /**
   * Minimum level written.
   * @default 'warn'
   */
  level?: LogLevel;
  /**
   * Emit one JSON object per line instead of human-readable text.
   * @default false
   */
  json?: boolean;
  /**
   * Receives each formatted line. Defaults to stderr, so that a driver's
   * stdout stays free for its own report.
   */
  write?: (line: string) => void;
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

function formatText(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5);
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] ${level} ${entry.logger}: ${entry.message}${data}`;
}

/**
 * Creates a leveled logger writing to stderr (or `config.write`).
 */
export function createLogger(config: LoggerConfig): Logger {
  const threshold = LOG_LEVEL_PRIORITY[config.level ?? 'warn'];
  const write = config.write ?? writeStderr;
  const format = config.json ? (entry: LogEntry) => JSON.stringify(entry) : formatText;

  const emit = (level: LogEntry['level'], message: string, data?: Record<string, unknown>) => {
    if (LOG_LEVEL_PRIORITY[level] < threshold) return;
    write(format({ level, logger: config.name, message, timestamp: new Date().toISOString(), data }));
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}

export const silentLogger: Logger = createLogger({ name: 'silent', level: 'silent' });
