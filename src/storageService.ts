import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { identityKeyOf } from "./normalizer";
import { SnapshotStore } from "./snapshotStore";
import { CanonicalEvent, EventType, ScheduleSnapshot } from "./types";

const log = logger.child("storage");

const SnapshotRowSchema = z.object({
  date: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  venue: z.string(),
  event_type: z.nativeEnum(EventType),
  title: z.string(),
  league: z.string().default(""),
});

const SnapshotFileSchema = z.object({
  captured_at: z.string(),
  window_days: z.number().int().positive().optional(),
  rows: z.array(SnapshotRowSchema),
});

export type SnapshotRow = z.infer<typeof SnapshotRowSchema>;
type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

export interface ExportMeta {
  timezone: string;
  venueFilter: string;
  daysAhead: number;
}

export function toRow(event: CanonicalEvent): SnapshotRow {
  return {
    date: event.date,
    start_time: event.startTime,
    end_time: event.endTime,
    venue: event.venue,
    event_type: event.eventType,
    title: event.title,
    league: event.league,
  };
}

export function fromRow(row: SnapshotRow): CanonicalEvent {
  return {
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    venue: row.venue,
    eventType: row.event_type,
    title: row.title,
    league: row.league,
    identityKey: identityKeyOf(row.date, row.start_time, row.venue),
  };
}

/** Snapshot store backed by one JSON file that each successful run overwrites. */
export class StorageService implements SnapshotStore {
  constructor(
    private readonly storagePath: string,
    private readonly exportPath?: string
  ) {}

  async putLatest(snapshot: ScheduleSnapshot): Promise<void> {
    await fs.ensureDir(path.dirname(this.storagePath));
    const file: SnapshotFile = {
      captured_at: snapshot.capturedAt,
      rows: snapshot.events.map(toRow),
    };

    if (snapshot.windowDays !== undefined) {
      file.window_days = snapshot.windowDays;
    }

    await fs.writeJSON(this.storagePath, file, { spaces: 2 });
    log.info(`Saved ${snapshot.events.length} ice times to ${this.storagePath}`);
  }

  async getLatest(): Promise<ScheduleSnapshot | null> {
    try {
      if (!(await fs.pathExists(this.storagePath))) {
        return null;
      }

      const parsed = SnapshotFileSchema.safeParse(await fs.readJSON(this.storagePath));
      if (!parsed.success) {
        log.warn(
          `Ignoring snapshot ${this.storagePath}: ${parsed.error.issues[0]?.message ?? "invalid content"}`
        );
        return null;
      }

      const snapshot: ScheduleSnapshot = {
        capturedAt: parsed.data.captured_at,
        events: parsed.data.rows.map(fromRow),
      };
      if (parsed.data.window_days !== undefined) {
        snapshot.windowDays = parsed.data.window_days;
      }
      return snapshot;
    } catch (error) {
      log.warn(`Failed to read snapshot file ${this.storagePath}: ${errorMessage(error)}`);
      return null;
    }
  }

  /** Full normalized schedule for display clients. */
  async writeExport(snapshot: ScheduleSnapshot, meta: ExportMeta): Promise<void> {
    if (!this.exportPath) {
      return;
    }

    await fs.ensureDir(path.dirname(this.exportPath));
    await fs.writeJSON(
      this.exportPath,
      {
        generated_at: snapshot.capturedAt,
        timezone: meta.timezone,
        venue_filter: meta.venueFilter,
        days_ahead: meta.daysAhead,
        items: snapshot.events.map(toRow),
      },
      { spaces: 2 }
    );
    log.info(`Exported ${snapshot.events.length} ice times to ${this.exportPath}`);
  }
}
