import { describe, it, expect } from 'vitest';
import { addDays, filterToWindow, localDateTime } from '../src/scheduleWindow';
import { event } from './helpers';

describe('localDateTime', () => {
  it('should read the wall clock in UTC', () => {
    expect(localDateTime(new Date('2025-11-02T14:05:00Z'), 'UTC')).toEqual({
      date: '2025-11-02',
      minutes: 14 * 60 + 5,
    });
  });

  it('should roll the date back for zones behind UTC', () => {
    // Halifax is on Atlantic Daylight Time (UTC-3) in July.
    expect(localDateTime(new Date('2025-07-10T02:30:00Z'), 'America/Halifax')).toEqual({
      date: '2025-07-09',
      minutes: 23 * 60 + 30,
    });
  });
});

describe('addDays', () => {
  it('should cross month and year boundaries', () => {
    expect(addDays('2025-11-28', 7)).toBe('2025-12-05');
    expect(addDays('2025-12-30', 3)).toBe('2026-01-02');
  });
});

describe('filterToWindow', () => {
  const now = new Date('2025-11-02T14:00:00Z');

  it('should keep upcoming events within the window', () => {
    const events = [
      event({ date: '2025-11-01', startTime: '18:00' }),
      event({ date: '2025-11-02', startTime: '12:00' }),
      event({ date: '2025-11-02', startTime: '13:00' }),
      event({ date: '2025-11-02', startTime: '13:30' }),
      event({ date: '2025-11-09', startTime: '20:00' }),
      event({ date: '2025-11-10', startTime: '08:00' }),
    ];

    const kept = filterToWindow(events, { now, days: 7, timezone: 'UTC' });

    expect(kept.map((e) => `${e.date} ${e.startTime}`)).toEqual([
      '2025-11-02 13:30',
      '2025-11-09 20:00',
    ]);
  });

  it('should honour a custom grace period', () => {
    const events = [event({ date: '2025-11-02', startTime: '12:00' })];

    expect(filterToWindow(events, { now, days: 7, timezone: 'UTC', graceMinutes: 180 })).toEqual(events);
    expect(filterToWindow(events, { now, days: 7, timezone: 'UTC', graceMinutes: 0 })).toEqual([]);
  });
});
