import { ILogger, LogLevel, LogMetadata } from '../../domain/common/ILogger';
import { AppError } from '../../domain/common/Errors';

export type LogFormat = 'text' | 'json';

const SEVERITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

/**
 * Console logger for the generation server.
 *
 * Text lines read `<time> [LEVEL] [<taskId>] [k=v ...] message {meta}`; the
 * task tag comes from a `taskId` in the child context. JSON lines carry the
 * same fields as one object, for log shippers.
 */
export class ConsoleLogger implements ILogger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly format: LogFormat = 'text',
    private readonly context: LogMetadata = {}
  ) {}

  error(message: string, error?: Error, meta?: LogMetadata): void {
    this.write('error', message, error ? { ...meta, ...describeError(error, this.level) } : meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write('debug', message, meta);
  }

  child(context: LogMetadata): ILogger {
    return new ConsoleLogger(this.level, this.format, { ...this.context, ...context });
  }

  private write(level: LogLevel, message: string, meta: LogMetadata = {}): void {
    if (SEVERITY[level] > SEVERITY[this.level]) return;

    const line = this.format === 'json'
      ? JSON.stringify({ time: new Date().toISOString(), level, msg: message, ...this.context, ...meta })
      : this.formatText(level, message, meta);

    switch (level) {
      case 'error': console.error(line); break;
      case 'warn': console.warn(line); break;
      case 'info': console.info(line); break;
      case 'debug': console.debug(line); break;
    }
  }

  private formatText(level: LogLevel, message: string, meta: LogMetadata): string {
    const { taskId, ...rest } = this.context;
    const tags = [`[${level.toUpperCase()}]`];
    if (taskId !== undefined) tags.push(`[${String(taskId)}]`);

    const pairs = Object.entries(rest).map(([k, v]) => `${k}=${String(v)}`);
    if (pairs.length > 0) tags.push(`[${pairs.join(' ')}]`);

    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${new Date().toISOString()} ${tags.join(' ')} ${message}${metaStr}`;
  }
}

/**
 * Error fields for a log line. Stacks only at debug level; app errors add
 * their code and HTTP status.
 */
function describeError(error: Error, level: LogLevel): LogMetadata {
  const fields: LogMetadata = { error: error.message };
  if (error instanceof AppError) {
    fields.code = error.code;
    fields.statusCode = error.statusCode;
  }
  if (level === 'debug') {
    fields.stack = error.stack;
  }
  return fields;
}
