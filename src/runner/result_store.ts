import { appendFile } from 'node:fs/promises';
import type { ResultSink } from '../types';

/**
 * Append-only path list backed by a file. The file is created up front so a
 * bad path fails before any job starts; appends are applied in call order.
 */
export async function open_result_sink(path: string): Promise<ResultSink> {
  await appendFile(path, '', 'utf8');
  let tail: Promise<void> = Promise.resolve();
  return {
    append(line: string): Promise<void> {
      const write = tail.then(() => appendFile(path, `${line}\n`, 'utf8'));
      tail = write.catch(() => undefined);
      return write;
    },
  };
}
