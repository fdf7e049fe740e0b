/**
 * Injectable logging capability used by the core modules
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured values attached to a log line
 */
export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/**
 * Logger that drops everything
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Render fields as ` key=value` pairs, skipping undefined values
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) {
    return '';
  }

  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${String(value)}`)
    .join('');
}
