/**
 * Tests for time-of-day helpers
 */

import { isWithinWindow, minuteOfDay, parseTimeOfDay } from './helpers';

describe('parseTimeOfDay', () => {
  it('should parse HH:MM into minutes after midnight', () => {
    expect(parseTimeOfDay('00:00')).toBe(0);
    expect(parseTimeOfDay('06:30')).toBe(390);
    expect(parseTimeOfDay('23:59')).toBe(1439);
  });

  it('should reject malformed times', () => {
    expect(parseTimeOfDay('24:00')).toBeNull();
    expect(parseTimeOfDay('6:30')).toBeNull();
    expect(parseTimeOfDay('06:60')).toBeNull();
    expect(parseTimeOfDay('')).toBeNull();
  });
});

describe('minuteOfDay', () => {
  it('should use local time', () => {
    expect(minuteOfDay(new Date(2024, 0, 1, 13, 45, 30).getTime())).toBe(825);
    expect(minuteOfDay(new Date(2024, 0, 1, 0, 0, 0).getTime())).toBe(0);
  });
});

describe('isWithinWindow', () => {
  it('should treat the start as inside and the end as outside', () => {
    expect(isWithinWindow(360, 360, 1080)).toBe(true);
    expect(isWithinWindow(1079, 360, 1080)).toBe(true);
    expect(isWithinWindow(1080, 360, 1080)).toBe(false);
    expect(isWithinWindow(359, 360, 1080)).toBe(false);
  });

  it('should wrap a window across midnight', () => {
    expect(isWithinWindow(1380, 1320, 360)).toBe(true);
    expect(isWithinWindow(359, 1320, 360)).toBe(true);
    expect(isWithinWindow(360, 1320, 360)).toBe(false);
    expect(isWithinWindow(720, 1320, 360)).toBe(false);
  });

  it('should treat an empty window as never open', () => {
    expect(isWithinWindow(600, 600, 600)).toBe(false);
  });
});
