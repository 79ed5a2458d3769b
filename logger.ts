/**
 * In-memory process log backing the "System Log" panel.
 *
 * Every entry is kept for display and mirrored to the browser console.
 * One logger is created per merge run.
 */

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  stage: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface StageLogger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

export class ProcessLogger {
  private entries: LogEntry[] = [];

  constructor(private readonly consoleEnabled: boolean = true) {}

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Lines as rendered in the System Log: `[time] [stage] message`
   */
  getFormattedLines(formatTime: (date: Date) => string = d => d.toLocaleTimeString()): string[] {
    return this.entries.map(entry => {
      const level = entry.level === 'INFO' ? '' : `${entry.level}: `;
      return `[${formatTime(entry.timestamp)}] [${entry.stage}] ${level}${entry.message}`;
    });
  }

  log(level: LogLevel, stage: string, message: string, metadata?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      stage,
      message,
      ...(metadata && { metadata }),
    };
    this.entries.push(entry);

    if (!this.consoleEnabled) return;
    const consoleMethod = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
    const metaStr = metadata ? ` ${JSON.stringify(metadata)}` : '';
    consoleMethod(`[${level}] [${stage}] ${message}${metaStr}`);
  }

  scoped(stage: string): StageLogger {
    return {
      info: (message, metadata) => this.log('INFO', stage, message, metadata),
      warn: (message, metadata) => this.log('WARN', stage, message, metadata),
      error: (message, metadata) => this.log('ERROR', stage, message, metadata),
    };
  }
}

// Stands in when the caller doesn't want a log
export const silentLogger: StageLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
