import debug from 'debug';

/**
 * The logging surface the client writes to. A homebridge `Logging` instance
 * fits it, so a plugin can hand over its own log.
 */
export interface ClientLogger {
  debug(message: string, ...parameters: unknown[]): void;
  info(message: string, ...parameters: unknown[]): void;
  warn(message: string, ...parameters: unknown[]): void;
  error(message: string, ...parameters: unknown[]): void;
}

export function loggerNamespace(host: string, port: number): string {
  return `uvc:${host}:${port}`;
}

// Enable with DEBUG=uvc:* (or uvc:*:warn,uvc:*:error for problems only).
export function createLogger(host: string, port: number): ClientLogger {
  const log = debug(loggerNamespace(host, port));

  return {
    debug: log.extend('debug'),
    info: log.extend('info'),
    warn: log.extend('warn'),
    error: log.extend('error'),
  };
}
