export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Defaults to stderr so stdout stays clean for chat replies. */
  stream?: NodeJS.WritableStream;
  now?: () => Date;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = (this.opts.now?.() ?? new Date()).toISOString();
    const out = this.opts.stream ?? process.stderr;

    if (this.opts.json) {
      out.write(`${JSON.stringify({ timestamp, level, message, data })}\n`);
      return;
    }

    const line = data === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(data)}`;
    out.write(`${line}\n`);
  }
}

/** Logger configured from the global `--verbose` / `--quiet` flags. */
export function createCliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const verbose = env.QCHAT_BRIDGE_VERBOSE === '1';
  const quiet = env.QCHAT_BRIDGE_QUIET === '1';
  return new Logger({ level: verbose ? 'debug' : 'warn', json: quiet });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
