import type { Output } from '../services/output';

export interface RecordedLine {
  level: 'info' | 'success' | 'warn' | 'error' | 'debug';
  message: string;
}

/**
 * Output that keeps every line for assertions. Blank lines are recorded as
 * empty info lines.
 */
export class RecordingOutput implements Output {
  readonly lines: RecordedLine[] = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  success(message: string): void {
    this.lines.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  blank(): void {
    this.info('');
  }

  /** Messages of the given level, in order. */
  messages(level: RecordedLine['level']): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}
