import { InvalidArgumentError, LookupError } from './errors.js';
import type {
  IspSettings,
  JsonValue,
  PictureSettingInput,
  PictureSettingKind,
  PictureSettingValue,
} from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['yes', true],
  ['on', true],
  ['1', true],
  ['false', false],
  ['no', false],
  ['off', false],
  ['0', false],
]);

/**
 * The kind a stored ISP value has. Null, array and object values have none:
 * they cannot be set through {@link coercePictureSetting}.
 */
export function settingKind(value: JsonValue): PictureSettingKind | undefined {
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'boolean':
      return 'boolean';
    case 'string':
      return 'string';
    default:
      return undefined;
  }
}

function describeType(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return settingKind(value) ?? typeof value;
}

function toInteger(input: PictureSettingInput): number | undefined {
  if (typeof input === 'boolean') {
    return input ? 1 : 0;
  }
  if (typeof input === 'number') {
    return Number.isInteger(input) ? input : undefined;
  }
  const text = input.trim();
  return INTEGER_PATTERN.test(text) ? Number.parseInt(text, 10) : undefined;
}

function toFloat(input: PictureSettingInput): number | undefined {
  if (typeof input === 'boolean') {
    return input ? 1 : 0;
  }
  const value = typeof input === 'number' ? input : input.trim() === '' ? Number.NaN : Number(input);
  return Number.isFinite(value) ? value : undefined;
}

function toBoolean(input: PictureSettingInput): boolean | undefined {
  if (typeof input === 'boolean') {
    return input;
  }
  if (typeof input === 'number') {
    return input !== 0;
  }
  return BOOLEAN_WORDS.get(input.trim().toLowerCase());
}

function coerce(kind: PictureSettingKind, input: PictureSettingInput): PictureSettingValue | undefined {
  switch (kind) {
    case 'integer': {
      const value = toInteger(input);
      return value === undefined ? undefined : { kind, value };
    }
    case 'float': {
      const value = toFloat(input);
      return value === undefined ? undefined : { kind, value };
    }
    case 'boolean': {
      const value = toBoolean(input);
      return value === undefined ? undefined : { kind, value };
    }
    case 'string':
      return { kind, value: String(input) };
  }
}

/**
 * Converts `input` to the kind of the value the camera currently stores at
 * `key`.
 */
export function coercePictureSetting(
  key: string,
  existing: JsonValue,
  input: PictureSettingInput,
): PictureSettingValue {
  const kind = settingKind(existing);
  const coerced = kind === undefined ? undefined : coerce(kind, input);
  if (!coerced) {
    throw new InvalidArgumentError(
      `Setting \`${key}' requires ${describeType(existing)} not ${typeof input}`,
    );
  }
  return coerced;
}

/**
 * Returns a copy of `current` with every entry of `changes` coerced into
 * place. Every key is checked before anything is returned.
 */
export function applyPictureSettings(
  current: IspSettings,
  changes: Readonly<Record<string, PictureSettingInput>>,
): IspSettings {
  const updated: IspSettings = { ...current };

  for (const [key, input] of Object.entries(changes)) {
    if (!Object.prototype.hasOwnProperty.call(current, key)) {
      throw new LookupError(`Unknown picture setting \`${key}'`, key);
    }
    updated[key] = coercePictureSetting(key, current[key], input).value;
  }

  return updated;
}
