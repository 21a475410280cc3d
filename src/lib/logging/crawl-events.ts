/**
 * Crawl Event Log
 * Emits one structured console line per crawl event
 */

export type CrawlEventType =
  | 'NAVIGATION'
  | 'ACTION'
  | 'WAIT'
  | 'OBSERVATION'
  | 'EXTRACTION'
  | 'SUMMARY';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface CrawlEvent {
  type: CrawlEventType;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export type CrawlEventSink = (event: CrawlEvent) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function formatEvent(event: CrawlEvent): string {
  const details = event.details ? ` ${JSON.stringify(event.details)}` : '';
  return `[${event.level.toUpperCase()}] ${event.timestamp} ${event.type} ${event.message}${details}`;
}

const consoleSink: CrawlEventSink = (event) => {
  const line = formatEvent(event);
  switch (event.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

export class CrawlEventLog {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly sink: CrawlEventSink = consoleSink
  ) {}

  emit(
    type: CrawlEventType,
    level: CrawlEvent['level'],
    message: string,
    details?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    this.sink({
      type,
      level,
      message,
      details,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Helper methods for common event types
   */
  navigate(message: string, details?: Record<string, unknown>): void {
    this.emit('NAVIGATION', 'info', message, details);
  }

  action(message: string, details?: Record<string, unknown>): void {
    this.emit('ACTION', 'info', message, details);
  }

  wait(message: string, details?: Record<string, unknown>): void {
    this.emit('WAIT', 'debug', message, details);
  }

  observe(message: string, details?: Record<string, unknown>): void {
    this.emit('OBSERVATION', 'debug', message, details);
  }

  extract(message: string, details?: Record<string, unknown>): void {
    this.emit('EXTRACTION', 'info', message, details);
  }

  summary(message: string, details?: Record<string, unknown>): void {
    this.emit('SUMMARY', 'info', message, details);
  }

  warn(type: CrawlEventType, message: string, details?: Record<string, unknown>): void {
    this.emit(type, 'warn', message, details);
  }

  error(type: CrawlEventType, message: string, details?: Record<string, unknown>): void {
    this.emit(type, 'error', message, details);
  }
}

export const silentLog = new CrawlEventLog('silent');
