export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string,
    private sink: LogSink = (line) => console.log(line),
  ) {}

  /** Same level and sink, tagged with a narrower scope. */
  child(scope: string) {
    return new Logger(this.level, this.scope ? `${this.scope}.${scope}` : scope, this.sink);
  }

  private shouldLog(level: LogLevel) {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    const payload = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(this.scope ? { scope: this.scope } : {}),
      ...data,
    };
    this.sink(JSON.stringify(payload));
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>) {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>) {
    this.log('error', message, data);
  }
}
