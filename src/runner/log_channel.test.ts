import { describe, it, expect } from 'vitest';

import { LogChannel, consume_logs } from './log_channel';
import { LogManager } from './logger';
import type { LogMessage } from '../types';

type Printed = Exclude<LogMessage, { kind: 'done' }>;

describe('LogChannel', () => {
  it('should deliver messages in send order', async () => {
    const channel = new LogChannel();
    channel.send({ kind: 'info', message: 'a' });
    channel.send({ kind: 'error', message: 'b' });

    expect(channel.pending).toBe(2);
    expect(await channel.receive()).toEqual({ kind: 'info', message: 'a' });
    expect(await channel.receive()).toEqual({ kind: 'error', message: 'b' });
    expect(channel.pending).toBe(0);
  });

  it('should wake a waiting receiver', async () => {
    const channel = new LogChannel();
    const next = channel.receive();
    channel.send({ kind: 'success', message: 'late' });

    expect(await next).toEqual({ kind: 'success', message: 'late' });
  });

  it('should reject a second concurrent receiver', async () => {
    const channel = new LogChannel();
    const first = channel.receive();

    await expect(channel.receive()).rejects.toThrow('LogChannel supports a single consumer');
    channel.send({ kind: 'done' });
    expect(await first).toEqual({ kind: 'done' });
  });
});

describe('consume_logs', () => {
  it('should print everything sent before done', async () => {
    const channel = new LogChannel();
    const log = new LogManager(channel);
    const printed: Printed[] = [];
    const consumer = consume_logs(channel, (m) => printed.push(m), true);

    const logger = log.create_logger();
    logger.info('one');
    logger.warn('two');
    logger.custom_error('three');
    log.done();
    await consumer;

    expect(printed).toEqual([
      { kind: 'info', message: 'one' },
      { kind: 'warn', message: 'two' },
      { kind: 'custom_error', message: 'three' },
    ]);
  });

  it('should drain silently when logs are hidden', async () => {
    const channel = new LogChannel();
    const log = new LogManager(channel);
    const printed: Printed[] = [];

    log.create_logger().error('hidden');
    log.done();
    await consume_logs(channel, (m) => printed.push(m), false);

    expect(printed).toEqual([]);
    expect(channel.pending).toBe(0);
  });
});
