import { Logger } from '../../infrastructure/logging/logger.js';

type JobLogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Per-job log capture. Lines end up in the job record's `log`; each one is
 * also forwarded to the service logger at debug level.
 */
export class JobLog {
  private lines: string[] = [];

  constructor(
    private jobId: string,
    private mirror?: Logger
  ) {}

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string): void {
    this.write('ERROR', message);
  }

  text(): string {
    return this.lines.length === 0 ? '' : `${this.lines.join('\n')}\n`;
  }

  private write(level: JobLogLevel, message: string): void {
    this.lines.push(`${new Date().toISOString()} ${level} ${message}`);
    this.mirror?.debug(message, { jobId: this.jobId, jobLogLevel: level });
  }
}
