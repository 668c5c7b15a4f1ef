import { pino } from 'pino';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** A real pino logger whose JSON lines are collected instead of printed. */
export function captureLogger() {
  const lines: LogLine[] = [];
  const log = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { log, lines };
}

export const WARN = 40;
export const ERROR = 50;
