import { open, type FileHandle } from 'fs/promises';
import { AcquisitionError, errorMessage } from '@core/errors';
import type { DataRecord, LogLevel } from '../types';

const LINE = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}) (.*)$/;
const CHUNK = 64 * 1024;
const NEWLINE = 0x0a;

export function detectLevel(message: string): LogLevel {
  const upper = message.toUpperCase();
  if (upper.includes('[ERROR]')) return 'ERROR';
  if (upper.includes('[WARN]') || upper.includes('[WARNING]')) return 'WARN';
  if (upper.includes('[DEBUG]')) return 'DEBUG';
  return 'INFO';
}

/**
 * Take the last `limit` lines of `text` and keep the timestamped ones
 */
export function parseLogLines(text: string, limit: number): DataRecord[] {
  const lines = text.split('\n').filter(l => l.trim().length > 0);
  const records: DataRecord[] = [];
  for (const line of lines.slice(-limit)) {
    const match = LINE.exec(line.trimEnd());
    if (!match) continue;
    const [, timestamp = '', message = ''] = match;
    records.push({ timestamp, level: detectLevel(message), message });
  }
  return records;
}

/**
 * Read backwards from the end of the file until `limit` lines are in hand
 */
export async function readLogTail(file: string, limit: number, signal?: AbortSignal): Promise<DataRecord[]> {
  let handle: FileHandle;
  try {
    handle = await open(file, 'r');
  } catch (error) {
    throw new AcquisitionError(`Cannot read ${file}: ${errorMessage(error)}`, 'log-file');
  }
  try {
    const { size } = await handle.stat();
    let start = size;
    let newlines = 0;
    const chunks: Buffer[] = [];
    while (start > 0 && newlines <= limit) {
      signal?.throwIfAborted();
      const length = Math.min(CHUNK, start);
      start -= length;
      const buffer = Buffer.alloc(length);
      await handle.read(buffer, 0, length, start);
      chunks.unshift(buffer);
      for (const byte of buffer) if (byte === NEWLINE) newlines++;
    }
    let text = Buffer.concat(chunks).toString('utf-8');
    // the first line is partial unless the file start was reached
    if (start > 0) text = text.slice(text.indexOf('\n') + 1);
    return parseLogLines(text, limit);
  } finally {
    await handle.close();
  }
}
