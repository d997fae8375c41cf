import { z } from "zod";
import { RecordParseError } from "./errors";
import { EventType, RawEventRecord } from "./types";

/**
 * The league API sends ids and type codes as numbers or numeric strings, and
 * leaves unset columns as null or "". Everything is read as trimmed text here.
 */
const scalarText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return undefined;
    }
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  });

const WireRecordSchema = z
  .object({
    game_id: scalarText,
    game_date: scalarText,
    game_start_time: scalarText,
    game_end_time: scalarText,
    team_a_name: scalarText,
    team_b_name: scalarText,
    team_schedule_date: scalarText,
    team_schedule_start_time: scalarText,
    team_schedule_end_time: scalarText,
    team_schedule_type_id: scalarText,
    team_name: scalarText,
    group_name: scalarText,
    league_name: scalarText,
    venue_name: scalarText,
  })
  .passthrough();

type WireFields = z.infer<typeof WireRecordSchema>;

const KNOWN_EVENT_TYPES: readonly EventType[] = [
  EventType.Practice,
  EventType.OffIce,
  EventType.Meeting,
  EventType.Tournament,
  EventType.Other,
  EventType.Evaluation,
  EventType.Game,
];

export function toEventType(code: string | undefined): EventType {
  if (code === undefined) {
    return EventType.Practice;
  }
  const numeric = Number(code);
  return KNOWN_EVENT_TYPES.find((type) => type === numeric) ?? EventType.Other;
}

function firstOf(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined);
}

/**
 * Reads one API item into its tagged shape. Records carrying a game id or a
 * game date are games; everything else (practices, meetings, evaluations, ...)
 * comes from the team schedule. Items that are not objects are rejected.
 */
export function parseRawRecord(wire: unknown): RawEventRecord {
  const parsed = WireRecordSchema.safeParse(wire);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || undefined;
    throw new RecordParseError(
      `Invalid value for ${field ?? "record"}: ${issue?.message ?? "unreadable record"}`,
      field
    );
  }

  const data: WireFields = parsed.data;
  const base = {
    date: firstOf(data.game_date, data.team_schedule_date),
    venue: data.venue_name,
    league: data.league_name,
  };

  if (data.game_id !== undefined || data.game_date !== undefined) {
    return {
      kind: "game",
      ...base,
      gameId: data.game_id,
      startTime: firstOf(data.game_start_time, data.team_schedule_start_time),
      endTime: firstOf(data.game_end_time, data.team_schedule_end_time),
      homeTeam: data.team_a_name,
      awayTeam: data.team_b_name,
    };
  }

  return {
    kind: "practice",
    ...base,
    startTime: data.team_schedule_start_time,
    endTime: data.team_schedule_end_time,
    teamName: firstOf(data.team_name, data.group_name),
    typeCode: toEventType(data.team_schedule_type_id),
  };
}

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/** "9:05", "09:05" and "09:05:00" all become "09:05". */
export function parseClockTime(value: string, field = "time"): string {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) {
    throw new RecordParseError(`Malformed ${field} "${value}"`, field);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new RecordParseError(`Out-of-range ${field} "${value}"`, field);
  }

  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseCalendarDate(value: string): string {
  const trimmed = value.trim();
  const match = DATE_PATTERN.exec(trimmed);
  if (!match) {
    throw new RecordParseError(`Malformed date "${value}"`, "date");
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new RecordParseError(`Impossible calendar date "${value}"`, "date");
  }

  return trimmed;
}
