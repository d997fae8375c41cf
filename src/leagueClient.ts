import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { ScheduleUnavailableError, errorMessage } from "./errors";
import { logger } from "./logger";

const log = logger.child("league-api");

const MASTER_SCHEDULE_PATH = "/api/teams/frontendMasterSchedule/";

// Game first, then practice, off-ice, meeting, tournament, evaluation, other.
const ALL_SCHEDULE_TYPES = "7,1,2,3,4,6,5";

const ScheduleEnvelopeSchema = z.object({
  status: z.string(),
  // Items are validated one by one during normalization.
  data: z.array(z.unknown()).default([]),
});

export interface LeagueClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

/** Anything that can hand the monitor a batch of raw schedule records. */
export interface ScheduleSource {
  fetchRecords(): Promise<unknown[]>;
}

export class LeagueClient implements ScheduleSource {
  private readonly http: AxiosInstance;

  constructor(options: LeagueClientOptions, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { "User-Agent": options.userAgent },
      });
  }

  /**
   * Fetches every upcoming ice time of every team and league. Venue and date
   * filtering happen afterwards; the API has no usable filter for them.
   */
  async fetchRecords(): Promise<unknown[]> {
    log.info("Fetching master schedule");

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(MASTER_SCHEDULE_PATH, {
        params: {
          true: 1,
          team_id: 0,
          league_id: 0,
          schedule_types: ALL_SCHEDULE_TYPES,
          season_id: 0,
          show_past: 0,
        },
      });
      body = response.data;
    } catch (error) {
      throw new ScheduleUnavailableError(
        `Master schedule request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const envelope = ScheduleEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ScheduleUnavailableError("Master schedule response has an unexpected shape");
    }

    if (envelope.data.status !== "success") {
      throw new ScheduleUnavailableError(
        `Master schedule returned status "${envelope.data.status}"`
      );
    }

    log.info(`API returned ${envelope.data.data.length} schedule items`);
    return envelope.data.data;
  }
}
