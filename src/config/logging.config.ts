import { LoggerService, LogLevel } from '@nestjs/common';

export interface LoggingConfig {
  level: LogLevel;
  bufferSize: number;
  flushInterval: number;
}

const LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function parseLevel(raw: string | undefined): LogLevel {
  const match = LEVEL_ORDER.find(level => level === raw);
  return match ?? 'log';
}

export const loadLoggingConfig = (env: NodeJS.ProcessEnv = process.env): LoggingConfig => ({
  level: parseLevel(env.LOG_LEVEL),
  bufferSize: parseInt(env.LOG_BUFFER_SIZE || '100', 10),
  flushInterval: parseInt(env.LOG_FLUSH_INTERVAL || '1000', 10),
});

/**
 * Application logger. Lines at or above the configured level are buffered
 * and written in batches; errors flush immediately.
 */
export class BufferedLogger implements LoggerService {
  private buffer: string[] = [];
  private readonly flushTimer: NodeJS.Timeout;

  constructor(
    private readonly config: LoggingConfig = loadLoggingConfig(),
    private readonly write: (chunk: string) => void = chunk => process.stdout.write(chunk),
  ) {
    this.flushTimer = setInterval(() => this.flush(), this.config.flushInterval);
    this.flushTimer.unref();
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.level);
  }

  private format(level: LogLevel, message: unknown, context?: string): string {
    const text = typeof message === 'string' ? message : JSON.stringify(message);
    return `${new Date().toISOString()} [${level.toUpperCase()}] ${context ? `[${context}] ` : ''}${text}`;
  }

  private add(level: LogLevel, message: unknown, context?: string, trace?: string) {
    if (!this.enabled(level)) {
      return;
    }
    this.buffer.push(this.format(level, message, context) + (trace ? `\n${trace}` : ''));

    if (level === 'error' || level === 'fatal' || this.buffer.length >= this.config.bufferSize) {
      this.flush();
    }
  }

  flush() {
    if (this.buffer.length > 0) {
      this.write(this.buffer.join('\n') + '\n');
      this.buffer = [];
    }
  }

  log(message: unknown, context?: string) {
    this.add('log', message, context);
  }

  error(message: unknown, trace?: string, context?: string) {
    this.add('error', message, context, trace);
  }

  warn(message: unknown, context?: string) {
    this.add('warn', message, context);
  }

  debug(message: unknown, context?: string) {
    this.add('debug', message, context);
  }

  verbose(message: unknown, context?: string) {
    this.add('verbose', message, context);
  }

  fatal(message: unknown, context?: string) {
    this.add('fatal', message, context);
  }

  /** Stops the flush timer and writes out whatever is buffered. */
  close() {
    clearInterval(this.flushTimer);
    this.flush();
  }

  onModuleDestroy() {
    this.close();
  }
}

/**
 * The application logger is handed to `NestFactory.create` rather than
 * registered as a provider, so no lifecycle hook closes it.
 */
export function flushOnExit(logger: BufferedLogger, target: NodeJS.EventEmitter = process): void {
  target.once('beforeExit', () => logger.close());
}
