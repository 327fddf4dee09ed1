export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogSink {
  write(chunk: string): unknown;
}

interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  sink?: LogSink;
  context?: Record<string, unknown>;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  // stdout carries command output, so log lines go to stderr
  private readonly sink: LogSink;
  private readonly context: Record<string, unknown> | undefined;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.sink = options.sink ?? process.stderr;
    this.context = options.context;
  }

  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      sink: this.sink,
      context: { ...this.context, ...context }
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (this.format === 'json') {
      const payload = {
        level,
        message,
        metadata: metadata ?? null,
        timestamp: new Date().toISOString()
      };
      return JSON.stringify(payload);
    }

    const metadataText = metadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${metadataText}`;
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    const merged = this.context ? { ...this.context, ...metadata } : metadata;
    this.sink.write(`${this.formatMessage(level, message, merged)}\n`);
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>) {
    this.write('error', message, metadata);
  }
}
