/**
 * Logger utility using Pino
 *
 * One root logger; modules take a named child via createLogger().
 * Pretty output only on an interactive terminal.
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';
const wantsPretty = Boolean(process.stdout.isTTY) && process.env.NODE_ENV !== 'test' && !process.env.VITEST;

let transport: pino.DestinationStream | undefined;
if (wantsPretty) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch {
    // pino-pretty not installed, fall back to JSON lines
    transport = undefined;
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
