import type { LogLevelName } from '../../shared/models';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface LogEntry {
  timestamp: number;
  level: LogLevelName;
  scope: string;
  message: string;
  data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

interface LoggerState {
  level: LogLevelName;
  logToConsole: boolean;
  listeners: LogListener[];
}

/**
 * Leveled logger with named scopes. Scoped children share level, console sink and subscribers.
 */
export class Logger {
  private constructor(
    private readonly scope: string,
    private readonly state: LoggerState
  ) {}

  public static create(options: { level?: LogLevelName; logToConsole?: boolean } = {}): Logger {
    return new Logger('CrossPlay', {
      level: options.level ?? 'info',
      logToConsole: options.logToConsole ?? true,
      listeners: []
    });
  }

  public child(scope: string): Logger {
    return new Logger(scope, this.state);
  }

  public setLevel(level: LogLevelName): void {
    this.state.level = level;
  }

  public subscribe(listener: LogListener): () => void {
    this.state.listeners.push(listener);
    return () => {
      this.state.listeners = this.state.listeners.filter((entry) => entry !== listener);
    };
  }

  public debug(message: string, data?: unknown): void {
    this.emit('debug', message, data);
  }

  public info(message: string, data?: unknown): void {
    this.emit('info', message, data);
  }

  public warn(message: string, data?: unknown): void {
    this.emit('warn', message, data);
  }

  public error(message: string, data?: unknown): void {
    this.emit('error', message, data);
  }

  private emit(level: LogLevelName, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) {
      return;
    }
    const entry: LogEntry = { timestamp: Date.now(), level, scope: this.scope, message, data };

    if (this.state.logToConsole) {
      const line = `[${new Date(entry.timestamp).toISOString()}] ${level.toUpperCase().padEnd(5)} [${this.scope}] ${message}`;
      // eslint-disable-next-line no-console -- The console is the log sink.
      const sink = level === 'debug' ? console.debug : level === 'info' ? console.info : level === 'warn' ? console.warn : console.error;
      if (data === undefined) {
        sink(line);
      } else {
        sink(line, data);
      }
    }

    for (const listener of this.state.listeners) {
      listener(entry);
    }
  }
}
