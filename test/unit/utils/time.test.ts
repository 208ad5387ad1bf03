import { describe, it, expect } from 'vitest';
import { dayStamp, fileStamp } from '../../../src/utils/time.js';
import { formatDuration } from '../../../src/utils/timer.js';

describe('time stamps', () => {
  // Local-time constructor, so the expectations hold in any time zone
  const date = new Date(2024, 2, 5, 7, 8, 9);

  it('formats the day as YYYY-MM-DD', () => {
    expect(dayStamp(date)).toBe('2024-03-05');
  });

  it('formats file stamps as YYYYMMDD_HHMMSS', () => {
    expect(fileStamp(date)).toBe('20240305_070809');
  });

  it('sorts file stamps chronologically', () => {
    const earlier = fileStamp(new Date(2024, 8, 30, 23, 59, 59));
    const later = fileStamp(new Date(2024, 9, 1, 0, 0, 0));
    expect([later, earlier].sort()).toEqual([earlier, later]);
  });
});

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
