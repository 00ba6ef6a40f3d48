export { UvcClient } from './api/client.js';
export type { OutputSink, UvcClientOptions } from './api/client.js';
export {
  ConfigurationError,
  InvalidArgumentError,
  LookupError,
  UvcApiError,
  UvcError,
  UvcResponseError,
} from './api/errors.js';
export { coercePictureSetting, settingKind } from './api/picture.js';
export { RECORDING_MODE_FLAGS, channelIndex, parseRecordingMode, recordingFlags } from './api/recording.js';
export { HttpTransport } from './api/transport.js';
export type { HttpTransportOptions, Transport, TransportRequest, TransportResponse } from './api/transport.js';
export type {
  CameraRecord,
  CameraSummary,
  ChannelName,
  IspSettings,
  JsonObject,
  JsonValue,
  PictureSettingInput,
  PictureSettingKind,
  PictureSettingValue,
  RecordingMode,
  RecordingSettings,
  UvcResult,
} from './api/types.js';
export { getConnectionFromEnv } from './env.js';
export { createLogger } from './logger.js';
export type { ClientLogger } from './logger.js';
export {
  CAMERA_API_PATH,
  CHANNEL_NAMES,
  DEFAULT_PATH,
  DEFAULT_PORT,
  RECORDING_MODES,
} from './settings.js';
export type { ConnectionConfig, ConnectionParameters } from './settings.js';
