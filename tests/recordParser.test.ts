import { describe, it, expect } from 'vitest';
import { RecordParseError } from '../src/errors';
import {
  parseCalendarDate,
  parseClockTime,
  parseRawRecord,
  toEventType,
} from '../src/recordParser';
import { EventType } from '../src/types';
import { gameRecord, practiceRecord } from './helpers';

describe('parseRawRecord', () => {
  it('should classify records with a game id as games', () => {
    const record = parseRawRecord(gameRecord());

    expect(record).toEqual({
      kind: 'game',
      date: '2025-11-02',
      venue: 'Amherst Stadium',
      league: 'U15 AA',
      gameId: '501',
      startTime: '12:00:00',
      endTime: '13:30:00',
      homeTeam: 'Dieppe',
      awayTeam: 'Cumberland Ramblers',
    });
  });

  it('should classify records without game fields as practices', () => {
    const record = parseRawRecord(practiceRecord({ team_schedule_type_id: 3 }));

    expect(record).toEqual({
      kind: 'practice',
      date: '2025-11-02',
      venue: 'Amherst Stadium',
      league: 'U13 B',
      startTime: '12:00:00',
      endTime: '13:00:00',
      teamName: 'U13 B Ramblers',
      typeCode: EventType.Meeting,
    });
  });

  it('should prefer game_date over team_schedule_date', () => {
    const record = parseRawRecord(
      gameRecord({ game_date: '2025-11-03', team_schedule_date: '2025-11-04' })
    );
    expect(record.date).toBe('2025-11-03');
  });

  it('should fall back to team_schedule_date when game_date is empty', () => {
    const record = parseRawRecord(
      gameRecord({ game_date: '', team_schedule_date: '2025-11-04' })
    );
    expect(record.kind).toBe('game');
    expect(record.date).toBe('2025-11-04');
  });

  it('should trim text and treat blanks as absent', () => {
    const record = parseRawRecord(
      practiceRecord({ team_name: '   ', group_name: ' Goalie Clinic ', venue_name: ' Amherst Stadium ' })
    );
    expect(record.kind).toBe('practice');
    if (record.kind === 'practice') {
      expect(record.teamName).toBe('Goalie Clinic');
    }
    expect(record.venue).toBe('Amherst Stadium');
  });

  it('should leave the date undefined when neither date field is present', () => {
    const record = parseRawRecord(practiceRecord({ team_schedule_date: null }));
    expect(record.date).toBeUndefined();
  });

  it('should reject non-scalar field values', () => {
    expect(() => parseRawRecord(gameRecord({ venue_name: { name: 'Amherst' } }))).toThrow(
      RecordParseError
    );
  });
});

describe('toEventType', () => {
  it('should default missing codes to practice', () => {
    expect(toEventType(undefined)).toBe(EventType.Practice);
  });

  it('should map known codes', () => {
    expect(toEventType('6')).toBe(EventType.Evaluation);
    expect(toEventType('7')).toBe(EventType.Game);
  });

  it('should map unknown codes to other', () => {
    expect(toEventType('42')).toBe(EventType.Other);
    expect(toEventType('abc')).toBe(EventType.Other);
  });
});

describe('parseClockTime', () => {
  it('should normalize to HH:MM', () => {
    expect(parseClockTime('9:05')).toBe('09:05');
    expect(parseClockTime('09:05')).toBe('09:05');
    expect(parseClockTime('21:45:00')).toBe('21:45');
  });

  it('should reject malformed or out-of-range times', () => {
    expect(() => parseClockTime('noon')).toThrow(RecordParseError);
    expect(() => parseClockTime('24:00')).toThrow('Out-of-range time "24:00"');
    expect(() => parseClockTime('12:60')).toThrow(RecordParseError);
  });
});

describe('parseCalendarDate', () => {
  it('should accept real dates', () => {
    expect(parseCalendarDate('2024-02-29')).toBe('2024-02-29');
  });

  it('should reject impossible or malformed dates', () => {
    expect(() => parseCalendarDate('2025-02-29')).toThrow('Impossible calendar date "2025-02-29"');
    expect(() => parseCalendarDate('11/02/2025')).toThrow('Malformed date "11/02/2025"');
  });
});
