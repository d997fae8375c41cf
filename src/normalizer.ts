import { RecordParseError, ScheduleUnavailableError, errorMessage } from "./errors";
import { parseCalendarDate, parseClockTime, parseRawRecord } from "./recordParser";
import {
  CanonicalEvent,
  DuplicatePolicy,
  EventType,
  RawEventRecord,
  SkippedRecord,
} from "./types";

export const TITLE_PLACEHOLDER = "TBA";

export interface NormalizeOptions {
  venueFilter: string;
  duplicatePolicy?: DuplicatePolicy;
  /** Throw when the raw input is empty instead of returning an empty schedule. */
  requireRecords?: boolean;
}

export interface NormalizeResult {
  events: CanonicalEvent[];
  skipped: SkippedRecord[];
  stats: {
    received: number;
    otherVenue: number;
    incomplete: number;
    malformed: number;
    duplicates: number;
  };
}

export function identityKeyOf(date: string, startTime: string, venue: string): string {
  return `${date}|${startTime}|${venue.trim().toLowerCase()}`;
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/** Chronological, then venue and title so equal slots still sort deterministically. */
export function compareEvents(a: CanonicalEvent, b: CanonicalEvent): number {
  return (
    compareText(a.date, b.date) ||
    compareText(a.startTime, b.startTime) ||
    compareText(a.venue, b.venue) ||
    compareText(a.title, b.title)
  );
}

function venueMatches(venue: string, venueFilter: string): boolean {
  return venue.toLowerCase() === venueFilter.trim().toLowerCase();
}

function buildTitle(record: RawEventRecord): string {
  switch (record.kind) {
    case "game": {
      if (record.homeTeam && record.awayTeam) {
        return `${record.homeTeam} vs ${record.awayTeam}`;
      }
      return record.homeTeam ?? record.awayTeam ?? TITLE_PLACEHOLDER;
    }
    case "practice":
      return record.teamName ?? TITLE_PLACEHOLDER;
  }
}

function eventTypeOf(record: RawEventRecord): EventType {
  switch (record.kind) {
    case "game":
      return EventType.Game;
    case "practice":
      return record.typeCode;
  }
}

function toCanonical(record: RawEventRecord, date: string, venue: string): CanonicalEvent {
  if (record.startTime === undefined) {
    throw new RecordParseError("Missing start time", "startTime");
  }
  if (record.endTime === undefined) {
    throw new RecordParseError("Missing end time", "endTime");
  }

  const canonicalDate = parseCalendarDate(date);
  const startTime = parseClockTime(record.startTime, "start time");
  const endTime = parseClockTime(record.endTime, "end time");

  return {
    date: canonicalDate,
    startTime,
    endTime,
    venue,
    eventType: eventTypeOf(record),
    title: buildTitle(record),
    league: record.league ?? "",
    identityKey: identityKeyOf(canonicalDate, startTime, venue),
  };
}

function describe(event: CanonicalEvent): string {
  return `${event.date} ${event.startTime} "${event.title}" (type ${event.eventType})`;
}

/** A canonical event together with the shape of the record it was read from. */
export interface DedupCandidate {
  event: CanonicalEvent;
  fromGameShape: boolean;
}

export function candidateOf(
  event: CanonicalEvent,
  fromGameShape = event.eventType === EventType.Game
): DedupCandidate {
  return { event, fromGameShape };
}

// Game-shaped records outrank team-schedule entries typed as games, which outrank the rest.
function rankOf(candidate: DedupCandidate): number {
  if (candidate.fromGameShape) {
    return 2;
  }
  return candidate.event.eventType === EventType.Game ? 1 : 0;
}

/**
 * Collapses events sharing an identity key. The higher-ranked record wins
 * silently; two records of the same rank are settled by `policy` and
 * reported as duplicates.
 * Output keeps the position of the first event seen for each key.
 */
export function dedupe(
  candidates: readonly DedupCandidate[],
  policy: DuplicatePolicy = "first"
): { events: CanonicalEvent[]; collisions: SkippedRecord[] } {
  const kept = new Map<string, DedupCandidate>();
  const collisions: SkippedRecord[] = [];

  for (const candidate of candidates) {
    const key = candidate.event.identityKey;
    const existing = kept.get(key);
    if (!existing) {
      kept.set(key, candidate);
      continue;
    }

    const existingRank = rankOf(existing);
    const incomingRank = rankOf(candidate);
    if (existingRank !== incomingRank) {
      if (incomingRank > existingRank) {
        kept.set(key, candidate);
      }
      continue;
    }

    const winner = policy === "last" ? candidate : existing;
    const loser = winner === candidate ? existing : candidate;
    kept.set(key, winner);
    collisions.push({
      reason: "duplicate",
      identityKey: key,
      message: `Kept ${describe(winner.event)} over ${describe(loser.event)} (policy "${policy}")`,
    });
  }

  return { events: [...kept.values()].map((entry) => entry.event), collisions };
}

export function normalizeRecords(
  rawRecords: readonly unknown[],
  options: NormalizeOptions
): NormalizeResult {
  const { venueFilter, duplicatePolicy = "first", requireRecords = true } = options;

  if (rawRecords.length === 0 && requireRecords) {
    throw new ScheduleUnavailableError("No schedule records were received");
  }

  const skipped: SkippedRecord[] = [];
  const candidates: DedupCandidate[] = [];
  let otherVenue = 0;

  rawRecords.forEach((wire, index) => {
    try {
      const record = parseRawRecord(wire);

      if (record.date === undefined) {
        skipped.push({ reason: "incomplete", index, message: "Record has no date" });
        return;
      }

      const venue = record.venue;
      if (venue === undefined || !venueMatches(venue, venueFilter)) {
        otherVenue += 1;
        return;
      }

      candidates.push({
        event: toCanonical(record, record.date, venue),
        fromGameShape: record.kind === "game",
      });
    } catch (error) {
      if (!(error instanceof RecordParseError)) {
        throw error;
      }
      skipped.push({ reason: "malformed", index, message: errorMessage(error) });
    }
  });

  const { events, collisions } = dedupe(candidates, duplicatePolicy);
  skipped.push(...collisions);

  return {
    events: events.sort(compareEvents),
    skipped,
    stats: {
      received: rawRecords.length,
      otherVenue,
      incomplete: skipped.filter((entry) => entry.reason === "incomplete").length,
      malformed: skipped.filter((entry) => entry.reason === "malformed").length,
      duplicates: collisions.length,
    },
  };
}

export function normalize(
  rawRecords: readonly unknown[],
  venueFilter: string
): CanonicalEvent[] {
  return normalizeRecords(rawRecords, { venueFilter }).events;
}
