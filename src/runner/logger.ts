import type { LogKind } from '../types';
import type { LogChannel } from './log_channel';

/** Send-only handle on the log channel, one per job. */
export class Logger {
  constructor(private readonly channel: LogChannel) {}

  info(message: string): void {
    this.send('info', message);
  }

  warn(message: string): void {
    this.send('warn', message);
  }

  error(message: string): void {
    this.send('error', message);
  }

  success(message: string): void {
    this.send('success', message);
  }

  /** Pre-formatted text, printed as-is on stderr. */
  custom_error(message: string): void {
    this.send('custom_error', message);
  }

  private send(kind: LogKind, message: string): void {
    this.channel.send({ kind, message });
  }
}

export class LogManager {
  constructor(private readonly channel: LogChannel) {}

  create_logger(): Logger {
    return new Logger(this.channel);
  }

  /** Terminates the consumer once everything sent before it is drained. */
  done(): void {
    this.channel.send({ kind: 'done' });
  }
}
