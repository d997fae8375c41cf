import { errorMessage } from "./errors";
import { ScheduleSource } from "./leagueClient";
import { Logger, logger as rootLogger } from "./logger";
import { normalizeRecords } from "./normalizer";
import { ChangeReport, diff } from "./scheduleDiffer";
import { filterToWindow, localDateTime } from "./scheduleWindow";
import { SnapshotStore } from "./snapshotStore";
import { ExportMeta } from "./storageService";
import { ChangeNotifier, NotificationContext } from "./telegramService";
import { DuplicatePolicy, ScheduleSnapshot } from "./types";

export interface MonitorOptions {
  venueFilter: string;
  monitorDays: number;
  timezone: string;
  duplicatePolicy: DuplicatePolicy;
  notifyOnFirstRun: boolean;
}

export interface ScheduleExporter {
  writeExport(snapshot: ScheduleSnapshot, meta: ExportMeta): Promise<void>;
}

export interface MonitorDeps {
  source: ScheduleSource;
  store: SnapshotStore;
  notifier?: ChangeNotifier;
  exporter?: ScheduleExporter;
  logger?: Logger;
}

export interface CycleOutcome {
  report: ChangeReport;
  isFirstRun: boolean;
  notified: boolean;
  persisted: boolean;
}

export function shouldNotify(
  report: ChangeReport,
  { isFirstRun, notifyOnFirstRun }: { isFirstRun: boolean; notifyOnFirstRun: boolean }
): boolean {
  if (report.isEmpty()) {
    return false;
  }
  return !isFirstRun || notifyOnFirstRun;
}

function formatLocal(now: Date, timezone: string): string {
  const local = localDateTime(now, timezone);
  const hours = String(Math.floor(local.minutes / 60)).padStart(2, "0");
  const minutes = String(local.minutes % 60).padStart(2, "0");
  return `${local.date} ${hours}:${minutes}`;
}

export class ScheduleMonitor {
  private running = false;
  private readonly log: Logger;

  constructor(
    private readonly deps: MonitorDeps,
    private readonly options: MonitorOptions
  ) {
    this.log = (deps.logger ?? rootLogger).child("monitor");
  }

  /**
   * One fetch → normalize → diff → notify → persist pass. Returns null when a
   * previous cycle is still in progress.
   */
  async runCycle(now: Date = new Date()): Promise<CycleOutcome | null> {
    if (this.running) {
      this.log.warn("Previous cycle still running, skipping this one");
      return null;
    }

    this.running = true;
    try {
      return await this.cycle(now);
    } finally {
      this.running = false;
    }
  }

  private async cycle(now: Date): Promise<CycleOutcome> {
    const { source, store, notifier, exporter } = this.deps;
    const { venueFilter, monitorDays, timezone } = this.options;
    const windowOptions = { now, days: monitorDays, timezone };

    const raw = await source.fetchRecords();
    const normalized = normalizeRecords(raw, {
      venueFilter,
      duplicatePolicy: this.options.duplicatePolicy,
    });

    for (const entry of normalized.skipped) {
      const where = entry.index === undefined ? "" : ` #${entry.index}`;
      if (entry.reason === "incomplete") {
        this.log.debug(`Skipped record${where}: ${entry.message}`);
      } else {
        this.log.warn(`Skipped ${entry.reason} record${where}: ${entry.message}`);
      }
    }

    const { stats } = normalized;
    this.log.info(
      `Normalized ${normalized.events.length} ice times at ${venueFilter} from ${stats.received} records ` +
        `(${stats.otherVenue} other venues, ${stats.incomplete} incomplete, ${stats.malformed} malformed, ${stats.duplicates} duplicates)`
    );

    const current: ScheduleSnapshot = {
      capturedAt: now.toISOString(),
      windowDays: monitorDays,
      events: filterToWindow(normalized.events, windowOptions),
    };

    if (current.events.length === 0) {
      this.log.warn(`No ice times at ${venueFilter} in the next ${monitorDays} days`);
    }

    const stored = await store.getLatest();
    const isFirstRun = stored === null;
    const previous: ScheduleSnapshot | null = stored && {
      ...stored,
      events: filterToWindow(stored.events, windowOptions),
    };

    const report = diff(previous, current);
    this.log.info(
      report.isEmpty() ? "No changes detected" : `Changes detected: ${report.summary()}`
    );

    let notified = false;
    let delivered = true;
    if (shouldNotify(report, { isFirstRun, notifyOnFirstRun: this.options.notifyOnFirstRun })) {
      if (notifier) {
        const context: NotificationContext = {
          venue: venueFilter,
          windowDays: monitorDays,
          detectedAt: formatLocal(now, timezone),
        };
        delivered = await notifier.notify(report, context);
        notified = delivered;
      } else {
        this.log.warn("No notifier configured, skipping notification");
      }
    } else if (isFirstRun && !report.isEmpty()) {
      this.log.info("First run, recording initial snapshot without notifying");
    }

    if (exporter) {
      try {
        await exporter.writeExport(
          { ...current, events: normalized.events },
          { timezone, venueFilter, daysAhead: monitorDays }
        );
      } catch (error) {
        this.log.error(`Failed to write schedule export: ${errorMessage(error)}`, error);
      }
    }

    if (!delivered) {
      this.log.warn("Notification failed, keeping previous snapshot so the changes are reported again");
      return { report, isFirstRun, notified, persisted: false };
    }

    await store.putLatest(current);
    return { report, isFirstRun, notified, persisted: true };
  }
}
