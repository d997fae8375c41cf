import { identityKeyOf } from '../src/normalizer';
import { CanonicalEvent, EventType, ScheduleSnapshot, WireRecord } from '../src/types';

export const VENUE = 'Amherst Stadium';

/**
 * Helper to create a game-shaped API record
 */
export function gameRecord(overrides: WireRecord = {}): WireRecord {
  return {
    game_id: 501,
    game_date: '2025-11-02',
    game_start_time: '12:00:00',
    game_end_time: '13:30:00',
    team_a_name: 'Dieppe',
    team_b_name: 'Cumberland Ramblers',
    league_name: 'U15 AA',
    venue_name: VENUE,
    ...overrides,
  };
}

/**
 * Helper to create a practice-shaped API record
 */
export function practiceRecord(overrides: WireRecord = {}): WireRecord {
  return {
    team_schedule_id: 88,
    team_schedule_date: '2025-11-02',
    team_schedule_start_time: '12:00:00',
    team_schedule_end_time: '13:00:00',
    team_schedule_type_id: '1',
    team_name: 'U13 B Ramblers',
    league_name: 'U13 B',
    venue_name: VENUE,
    ...overrides,
  };
}

export function event(overrides: Partial<CanonicalEvent> = {}): CanonicalEvent {
  const base = {
    date: '2025-11-02',
    startTime: '12:00',
    endTime: '13:30',
    venue: VENUE,
    eventType: EventType.Game,
    title: 'Dieppe vs Cumberland Ramblers',
    league: 'U15 AA',
    ...overrides,
  };
  return {
    ...base,
    identityKey: overrides.identityKey ?? identityKeyOf(base.date, base.startTime, base.venue),
  };
}

export function snapshot(events: CanonicalEvent[], capturedAt = '2025-11-01T12:00:00.000Z'): ScheduleSnapshot {
  return { capturedAt, events };
}
