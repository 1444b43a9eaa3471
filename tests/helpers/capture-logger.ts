import { pino } from 'pino';
import type { Logger } from 'pino';

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function parseLine(line: string): CapturedLog {
  const value: unknown = JSON.parse(line);
  if (typeof value !== 'object' || value === null) {
    throw new Error(`Unexpected log line: ${line}`);
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const level = record['level'];
  const msg = record['msg'];
  return { ...record, level: typeof level === 'number' ? level : 0, msg: typeof msg === 'string' ? msg : '' };
}

/**
 * Logger that keeps every record in memory.
 */
export function captureLogger(level = 'debug'): { logger: Logger; records: () => CapturedLog[]; messages: () => string[] } {
  const lines: string[] = [];
  const logger = pino({ level, base: undefined }, { write: (line: string) => void lines.push(line) });
  const records = () => lines.map(parseLine);
  return { logger, records, messages: () => records().map(r => r.msg) };
}
