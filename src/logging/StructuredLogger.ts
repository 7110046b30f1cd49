import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

export interface StructuredLoggerOptions {
  /** Echo entries to the console. The terminal REPL turns this off so logs don't garble typed text. */
  console?: boolean;
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly options: Required<StructuredLoggerOptions>
  ) {}

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `voxpipe-${datePrefix}.log`);

    return new StructuredLogger(filePath, {
      console: options.console ?? true,
      prefix: options.prefix ?? 'voxpipe'
    });
  }

  public getLogPath(): string {
    return this.filePath;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  public async flush(): Promise<void> {
    await this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[${this.options.prefix}] Failed to write log file: ${detail}`);
      });

    // Debug noise stays in the file.
    if (!this.options.console || LEVEL_ORDER[level] < LEVEL_ORDER.info) {
      return;
    }

    if (level === 'error') {
      console.error(`[${this.options.prefix}] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[${this.options.prefix}] ${message}`, context);
      return;
    }

    console.log(`[${this.options.prefix}] ${message}`, context);
  }
}
