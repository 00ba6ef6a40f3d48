import { UvcResponseError } from './errors.js';
import type {
  CameraRecord,
  CameraSummary,
  IspSettings,
  JsonObject,
  JsonValue,
  RecordingSettings,
} from './types.js';

const RECORDING_KEYS = ['fullTimeRecordEnabled', 'motionRecordEnabled', 'channel'];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the entries of the `data` array every NVR response is wrapped in. */
export function decodeEnvelope(body: unknown): JsonObject[] {
  if (!isJsonObject(body) || !Array.isArray(body.data)) {
    throw new UvcResponseError('Response has no data array');
  }

  return body.data.map((entry, index) => {
    if (!isJsonObject(entry)) {
      throw new UvcResponseError(`Response data[${index}] is not an object`);
    }
    return entry;
  });
}

export function firstEntry(body: unknown): JsonObject {
  const [entry] = decodeEnvelope(body);
  if (!entry) {
    throw new UvcResponseError('Response data is empty');
  }
  return entry;
}

function readObject(entry: JsonObject, key: string): JsonObject {
  const value = entry[key];
  if (!isJsonObject(value)) {
    throw new UvcResponseError(`Camera record has no ${key} object`);
  }
  return value;
}

function readFlag(raw: JsonObject, key: string): boolean {
  const value: JsonValue | undefined = raw[key];
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new UvcResponseError(`recordingSettings.${key} is not a boolean`);
  }
  return value;
}

export function readRecordingSettings(entry: JsonObject): JsonObject {
  return readObject(entry, 'recordingSettings');
}

export function readIspSettings(entry: JsonObject): IspSettings {
  return { ...readObject(entry, 'ispSettings') };
}

export function decodeRecordingSettings(raw: JsonObject): RecordingSettings {
  const passthrough: JsonObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!RECORDING_KEYS.includes(key)) {
      passthrough[key] = value;
    }
  }

  const settings: RecordingSettings = {
    fullTimeRecordEnabled: readFlag(raw, 'fullTimeRecordEnabled'),
    motionRecordEnabled: readFlag(raw, 'motionRecordEnabled'),
    passthrough,
  };

  const channel: JsonValue | undefined = raw.channel;
  if (channel !== undefined) {
    if (typeof channel !== 'number') {
      throw new UvcResponseError('recordingSettings.channel is not a number');
    }
    settings.channel = channel;
  }

  return settings;
}

export function encodeRecordingSettings(settings: RecordingSettings): JsonObject {
  const encoded: JsonObject = {
    ...settings.passthrough,
    fullTimeRecordEnabled: settings.fullTimeRecordEnabled,
    motionRecordEnabled: settings.motionRecordEnabled,
  };
  if (settings.channel !== undefined) {
    encoded.channel = settings.channel;
  }
  return encoded;
}

export function decodeCameraRecord(entry: JsonObject): CameraRecord {
  const recordingSettings = decodeRecordingSettings(readRecordingSettings(entry));
  const ispSettings = readIspSettings(entry);

  const passthrough: JsonObject = { ...entry };
  delete passthrough.recordingSettings;
  delete passthrough.ispSettings;

  return { recordingSettings, ispSettings, passthrough };
}

export function encodeCameraRecord(record: CameraRecord): JsonObject {
  return {
    ...record.passthrough,
    recordingSettings: encodeRecordingSettings(record.recordingSettings),
    ispSettings: { ...record.ispSettings },
  };
}

function readString(entry: JsonObject, key: string): string {
  const value = entry[key];
  if (typeof value !== 'string') {
    throw new UvcResponseError(`Camera ${key} is not a string`);
  }
  return value;
}

export function decodeCameraSummary(entry: JsonObject): CameraSummary {
  const managed = entry.managed;
  if (typeof managed !== 'boolean') {
    throw new UvcResponseError('Camera managed flag is not a boolean');
  }

  return {
    name: readString(entry, 'name'),
    uuid: readString(entry, 'uuid'),
    state: readString(entry, 'state'),
    managed,
  };
}
