import { compareEvents } from "./normalizer";
import {
  CanonicalEvent,
  ComparedField,
  ModifiedEvent,
  PriorValues,
  ScheduleSnapshot,
} from "./types";

export const COMPARED_FIELDS: readonly ComparedField[] = [
  "title",
  "endTime",
  "eventType",
  "venue",
];

export class ChangeReport {
  constructor(
    readonly added: readonly CanonicalEvent[],
    readonly removed: readonly CanonicalEvent[],
    readonly modified: readonly ModifiedEvent[]
  ) {}

  /** No differences: the caller should stay silent. */
  isEmpty(): boolean {
    return this.added.length === 0 && this.removed.length === 0 && this.modified.length === 0;
  }

  summary(): string {
    return `${this.added.length} added, ${this.removed.length} removed, ${this.modified.length} modified`;
  }
}

function indexByKey(events: readonly CanonicalEvent[]): Map<string, CanonicalEvent> {
  const index = new Map<string, CanonicalEvent>();
  for (const event of events) {
    if (!index.has(event.identityKey)) {
      index.set(event.identityKey, event);
    }
  }
  return index;
}

function recordPrior(prior: PriorValues, field: ComparedField, previous: CanonicalEvent): void {
  switch (field) {
    case "title":
      prior.title = previous.title;
      break;
    case "endTime":
      prior.endTime = previous.endTime;
      break;
    case "eventType":
      prior.eventType = previous.eventType;
      break;
    case "venue":
      prior.venue = previous.venue;
      break;
  }
}

export function compareEvent(
  previous: CanonicalEvent,
  current: CanonicalEvent
): ModifiedEvent | null {
  const changedFields = COMPARED_FIELDS.filter((field) => previous[field] !== current[field]);
  if (changedFields.length === 0) {
    return null;
  }

  const priorValues: PriorValues = {};
  changedFields.forEach((field) => recordPrior(priorValues, field, previous));

  return {
    identityKey: current.identityKey,
    previous,
    current,
    changedFields,
    priorValues,
  };
}

/**
 * Classifies every slot of the two snapshots by identity key. A missing
 * previous snapshot (first run) makes every current event an addition.
 */
export function diff(
  previous: ScheduleSnapshot | null,
  current: ScheduleSnapshot
): ChangeReport {
  const before = indexByKey(previous?.events ?? []);
  const after = indexByKey(current.events);

  const added: CanonicalEvent[] = [];
  const modified: ModifiedEvent[] = [];

  for (const [key, event] of after) {
    const old = before.get(key);
    if (!old) {
      added.push(event);
      continue;
    }
    const change = compareEvent(old, event);
    if (change) {
      modified.push(change);
    }
  }

  const removed = [...before.entries()]
    .filter(([key]) => !after.has(key))
    .map(([, event]) => event);

  return new ChangeReport(
    added.sort(compareEvents),
    removed.sort(compareEvents),
    modified.sort((a, b) => compareEvents(a.current, b.current))
  );
}
