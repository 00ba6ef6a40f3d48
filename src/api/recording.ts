import { CHANNEL_NAMES, RECORDING_MODES } from '../settings.js';
import { InvalidArgumentError, LookupError } from './errors.js';
import type { ChannelName, RecordingFlags, RecordingMode } from './types.js';

export const RECORDING_MODE_FLAGS: Readonly<Record<RecordingMode, RecordingFlags>> = {
  none: { fullTimeRecordEnabled: false, motionRecordEnabled: false },
  full: { fullTimeRecordEnabled: true, motionRecordEnabled: false },
  motion: { fullTimeRecordEnabled: false, motionRecordEnabled: true },
};

function isRecordingMode(mode: string): mode is RecordingMode {
  return RECORDING_MODES.some(known => known === mode);
}

function isChannelName(name: string): name is ChannelName {
  return CHANNEL_NAMES.some(known => known === name);
}

/** Case-insensitive. */
export function parseRecordingMode(mode: string): RecordingMode {
  const normalized = mode.toLowerCase();
  if (!isRecordingMode(normalized)) {
    throw new InvalidArgumentError(
      `Unknown recording mode \`${mode}'; expected one of ${RECORDING_MODES.join(', ')}`,
    );
  }
  return normalized;
}

export function recordingFlags(mode: string): RecordingFlags {
  return { ...RECORDING_MODE_FLAGS[parseRecordingMode(mode)] };
}

export function channelIndex(name: string): number {
  if (!isChannelName(name)) {
    throw new LookupError(
      `Unknown channel \`${name}'; expected one of ${CHANNEL_NAMES.join(', ')}`,
      name,
    );
  }
  return CHANNEL_NAMES.indexOf(name);
}
