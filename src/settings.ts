export const DEFAULT_PORT = 7080;
export const DEFAULT_PATH = '/';
export const DEFAULT_TIMEOUT = 10_000; // milliseconds

export const CAMERA_API_PATH = '/api/2.0/camera';

export const ENV_COMBINED = 'UVC';
export const ENV_HOST = 'UVC_HOST';
export const ENV_PORT = 'UVC_PORT';
export const ENV_API_KEY = 'UVC_APIKEY';

// Order matters: the position is the channel index the NVR stores.
export const CHANNEL_NAMES = ['high', 'medium', 'low'] as const;

export const RECORDING_MODES = ['none', 'full', 'motion'] as const;

export interface ConnectionParameters {
  host: string;
  port: number;
  apiKey: string;
  path: string;
}

export interface ConnectionConfig {
  host: string;
  port?: number;
  apiKey: string;
  path?: string;
}
