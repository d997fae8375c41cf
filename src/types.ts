export enum EventType {
  Practice = 1,
  OffIce = 2,
  Meeting = 3,
  Tournament = 4,
  Other = 5,
  Evaluation = 6,
  Game = 7,
}

export const EVENT_TYPE_LABELS: Record<EventType, string> = {
  [EventType.Practice]: "Practice",
  [EventType.OffIce]: "Off-Ice Training",
  [EventType.Meeting]: "Team Meeting",
  [EventType.Tournament]: "Tournament Game",
  [EventType.Other]: "Other",
  [EventType.Evaluation]: "Evaluation",
  [EventType.Game]: "Game",
};

/** A schedule item exactly as the league API returns it. */
export type WireRecord = Record<string, unknown>;

export interface RawRecordBase {
  date?: string; // game_date, falling back to team_schedule_date
  startTime?: string;
  endTime?: string;
  venue?: string;
  league?: string;
}

export interface RawGameRecord extends RawRecordBase {
  kind: "game";
  gameId?: string;
  homeTeam?: string;
  awayTeam?: string;
}

export interface RawPracticeRecord extends RawRecordBase {
  kind: "practice";
  teamName?: string;
  typeCode: EventType;
}

export type RawEventRecord = RawGameRecord | RawPracticeRecord;

export interface CanonicalEvent {
  date: string; // YYYY-MM-DD
  startTime: string; // HH:MM
  endTime: string; // HH:MM
  venue: string;
  eventType: EventType;
  title: string;
  league: string;
  identityKey: string;
}

export interface ScheduleSnapshot {
  capturedAt: string;
  windowDays?: number;
  events: CanonicalEvent[];
}

export type ComparedField = "title" | "endTime" | "eventType" | "venue";

export type PriorValues = Partial<Pick<CanonicalEvent, ComparedField>>;

export interface ModifiedEvent {
  identityKey: string;
  previous: CanonicalEvent;
  current: CanonicalEvent;
  changedFields: ComparedField[];
  priorValues: PriorValues;
}

export type DuplicatePolicy = "first" | "last";

export type SkipReason = "incomplete" | "malformed" | "duplicate";

export interface SkippedRecord {
  reason: SkipReason;
  /** Position in the raw input; absent for duplicates found among canonical events. */
  index?: number;
  identityKey?: string;
  message: string;
}
