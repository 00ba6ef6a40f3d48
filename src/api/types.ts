import type { CHANNEL_NAMES, RECORDING_MODES } from '../settings.js';
import type { UvcError } from './errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type HttpMethod = 'GET' | 'PUT';

export type UvcResult<T> = { ok: true; value: T } | { ok: false; error: UvcError };

export type RecordingMode = (typeof RECORDING_MODES)[number];
export type ChannelName = (typeof CHANNEL_NAMES)[number];

export interface RecordingFlags {
  fullTimeRecordEnabled: boolean;
  motionRecordEnabled: boolean;
}

export interface RecordingSettings extends RecordingFlags {
  channel?: number;
  /** Fields the client does not interpret, sent back as received. */
  passthrough: JsonObject;
}

export type IspSettings = JsonObject;

export interface CameraRecord {
  recordingSettings: RecordingSettings;
  ispSettings: IspSettings;
  passthrough: JsonObject;
}

export interface CameraSummary {
  name: string;
  uuid: string;
  state: string;
  managed: boolean;
}

export type PictureSettingValue =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string'; value: string };

export type PictureSettingKind = PictureSettingValue['kind'];

export type PictureSettingInput = string | number | boolean;
