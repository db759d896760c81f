/**
 * Logger contract shared by services.
 *
 * Object-first like pino, so Fastify's `app.log` can be passed straight in
 * through `fromFastifyLogger`. Standalone entry points use the console logger.
 */

import type { FastifyBaseLogger } from 'fastify';

export type LogFields = Record<string, unknown>;

export interface Logger {
  info: (obj: LogFields, msg?: string) => void;
  warn: (obj: LogFields, msg?: string) => void;
  error: (obj: LogFields, msg?: string) => void;
  debug?: (obj: LogFields, msg?: string) => void;
}

function format(tag: string, obj: LogFields, msg?: string): string {
  const fields = Object.keys(obj).length > 0 ? ` ${JSON.stringify(obj)}` : '';
  return `[${tag}] ${msg ?? ''}${fields}`;
}

/**
 * `stderrOnly` keeps stdout free for command output (CLI reports)
 */
export function createConsoleLogger(tag: string, stderrOnly = false): Logger {
  const out = stderrOnly ? console.error : console.log;
  return {
    info: (obj, msg) => out(format(tag, obj, msg)),
    warn: (obj, msg) => console.warn(format(tag, obj, msg)),
    error: (obj, msg) => console.error(format(tag, obj, msg)),
    debug: (obj, msg) => (stderrOnly ? console.error : console.debug)(format(tag, obj, msg)),
  };
}

export function fromFastifyLogger(log: FastifyBaseLogger): Logger {
  return {
    info: (obj, msg) => log.info(obj, msg),
    warn: (obj, msg) => log.warn(obj, msg),
    error: (obj, msg) => log.error(obj, msg),
    debug: (obj, msg) => log.debug(obj, msg),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
