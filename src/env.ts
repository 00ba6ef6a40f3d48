import { ConfigurationError } from './api/errors.js';
import {
  DEFAULT_PATH,
  DEFAULT_PORT,
  ENV_API_KEY,
  ENV_COMBINED,
  ENV_HOST,
  ENV_PORT,
} from './settings.js';
import type { ConnectionParameters } from './settings.js';

// scheme://[userinfo@]host[:port]
const AUTHORITY_PORT = /^[a-z][a-z\d+.-]*:\/\/(?:[^/?#@]*@)?(?:\[[^\]]*\]|[^/?#:]*):(\d+)(?:[/?#]|$)/i;

function parsePort(value: string, source: string): number {
  const trimmed = value.trim();
  const port = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`${source} has an invalid port: ${value}`);
  }
  return port;
}

/**
 * Parses `UVC=http://host[:port]/?apiKey=KEY`. The WHATWG parser drops a port
 * equal to the scheme default, so the port is read from the raw authority.
 */
function fromCombined(value: string): ConnectionParameters {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(`${ENV_COMBINED} is not a valid URL: ${value}`);
  }

  const apiKey = url.searchParams.get('apiKey');
  if (!apiKey) {
    throw new ConfigurationError(`${ENV_COMBINED} has no apiKey query parameter`);
  }

  const explicitPort = AUTHORITY_PORT.exec(value)?.[1];

  return {
    host: url.hostname,
    port: explicitPort === undefined ? DEFAULT_PORT : parsePort(explicitPort, ENV_COMBINED),
    apiKey,
    path: url.pathname,
  };
}

function fromDiscrete(env: NodeJS.ProcessEnv): ConnectionParameters {
  const host = env[ENV_HOST];
  if (!host) {
    throw new ConfigurationError(`${ENV_HOST} is not set`);
  }

  const apiKey = env[ENV_API_KEY];
  if (!apiKey) {
    throw new ConfigurationError(`${ENV_API_KEY} is not set`);
  }

  const port = env[ENV_PORT];

  return {
    host,
    port: port ? parsePort(port, ENV_PORT) : DEFAULT_PORT,
    apiKey,
    path: DEFAULT_PATH,
  };
}

/**
 * Reads NVR connection parameters from the environment, either from one
 * combined URL:
 *
 *     UVC=http://192.168.1.1:7080/?apiKey=XXXXXXXX
 *
 * or from separate variables:
 *
 *     UVC_HOST=192.168.1.1
 *     UVC_PORT=7080
 *     UVC_APIKEY=XXXXXXXX
 *
 * The returned path is not checked here; the client rejects anything
 * but `/`.
 */
export function getConnectionFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionParameters {
  const combined = env[ENV_COMBINED];
  return combined ? fromCombined(combined) : fromDiscrete(env);
}
