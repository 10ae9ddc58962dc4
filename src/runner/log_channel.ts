import type { LogMessage } from '../types';

/**
 * Unbounded multi-producer / single-consumer queue.
 * send() never blocks; receive() resolves with the next message in send order.
 */
export class LogChannel {
  private readonly queue: LogMessage[] = [];
  private waiting: ((message: LogMessage) => void) | null = null;

  send(message: LogMessage): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(message);
      return;
    }
    this.queue.push(message);
  }

  receive(): Promise<LogMessage> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.waiting) {
      return Promise.reject(new Error('LogChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /** Messages sent but not yet received. */
  get pending(): number {
    return this.queue.length;
  }
}

/**
 * Drains `channel` until the `done` sentinel. With `show_log` off, messages
 * are consumed and dropped.
 */
export async function consume_logs(
  channel: LogChannel,
  print: (message: Exclude<LogMessage, { kind: 'done' }>) => void,
  show_log: boolean
): Promise<void> {
  for (;;) {
    const message = await channel.receive();
    if (message.kind === 'done') return;
    if (show_log) print(message);
  }
}
