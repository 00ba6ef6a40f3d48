import { describe, expect, it } from 'vitest';

import { InvalidArgumentError, LookupError } from './errors.js';
import { channelIndex, parseRecordingMode, recordingFlags } from './recording.js';

describe('recordingFlags', () => {
  it.each([
    ['none', false, false],
    ['full', true, false],
    ['motion', false, true],
  ])('should map %s to full=%s motion=%s', (mode, fullTime, motion) => {
    expect(recordingFlags(mode)).toEqual({
      fullTimeRecordEnabled: fullTime,
      motionRecordEnabled: motion,
    });
  });

  it('should ignore case', () => {
    expect(parseRecordingMode('MoTiOn')).toBe('motion');
    expect(recordingFlags('FULL')).toEqual({ fullTimeRecordEnabled: true, motionRecordEnabled: false });
  });

  it('should reject unknown modes', () => {
    expect(() => recordingFlags('always')).toThrow(InvalidArgumentError);
    expect(() => recordingFlags('always')).toThrow(
      "Unknown recording mode `always'; expected one of none, full, motion",
    );
  });

  it('should return a copy of the table entry', () => {
    const flags = recordingFlags('none');
    flags.fullTimeRecordEnabled = true;

    expect(recordingFlags('none').fullTimeRecordEnabled).toBe(false);
  });
});

describe('channelIndex', () => {
  it.each([
    ['high', 0],
    ['medium', 1],
    ['low', 2],
  ])('should resolve %s to %i', (name, index) => {
    expect(channelIndex(name)).toBe(index);
  });

  it('should raise a lookup failure for unknown channels', () => {
    expect(() => channelIndex('ultra')).toThrow(LookupError);
    expect(() => channelIndex('ultra')).toThrow("Unknown channel `ultra'; expected one of high, medium, low");
  });

  it('should match channel names exactly', () => {
    expect(() => channelIndex('HIGH')).toThrow(LookupError);
  });
});
