/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// Pretty output is for people at a terminal; tests and pipes get JSON lines.
const wantsPretty = Boolean(process.stdout.isTTY) && process.env.NODE_ENV !== 'test' && level !== 'silent';

let transport: pino.DestinationStream | undefined;
if (wantsPretty) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } catch (error) {
    process.stderr.write(`pino-pretty unavailable, using JSON logs: ${String(error)}\n`);
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level }, pino.destination(2));

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
