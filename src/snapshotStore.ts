import { ScheduleSnapshot } from "./types";

/** Holds the single snapshot a run compares against and then replaces. */
export interface SnapshotStore {
  getLatest(): Promise<ScheduleSnapshot | null>;
  putLatest(snapshot: ScheduleSnapshot): Promise<void>;
}

export class MemorySnapshotStore implements SnapshotStore {
  private latest: ScheduleSnapshot | null;

  constructor(initial: ScheduleSnapshot | null = null) {
    this.latest = initial;
  }

  async getLatest(): Promise<ScheduleSnapshot | null> {
    return this.latest;
  }

  async putLatest(snapshot: ScheduleSnapshot): Promise<void> {
    this.latest = { ...snapshot, events: [...snapshot.events] };
  }
}
