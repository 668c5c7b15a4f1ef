import { pino, type Logger } from 'pino';

const underTest = process.env.NODE_ENV === 'test' || !!process.env.VITEST;
const pretty = !underTest && process.stdout.isTTY;

export const logger = pino({
  name: 'sales-staging',
  level: process.env.LOG_LEVEL ?? (underTest ? 'silent' : 'info'),
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {}),
});

export type { Logger };
