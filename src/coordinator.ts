/**
 * Polls one Tunnelflight account and shares the latest data with its
 * accessory and the logbook services.
 */
import { EventEmitter } from 'events';
import type { UserData } from './api/types.js';
import type { TunnelflightApi } from './api/tunnelflight-api.js';
import { formatFlightTime, parseFlightTime } from './utils/format.js';
import { type EnhancedLogger, LogContext } from './utils/logger.js';

/**
 * What the coordinator needs from the API client
 */
export type UserDataSource = Pick<TunnelflightApi, 'username' | 'getUserData'>;

/**
 * Coordinator events:
 * - `update` (data: UserData) after a successful refresh or a logged flight
 * - `failed` (error: Error) when a refresh brings no data
 */
export class TunnelflightCoordinator extends EventEmitter {
  private currentData: UserData | null = null;
  private updated: Date | null = null;
  private success = false;
  private inFlight: Promise<UserData | null> | null = null;
  private pollTimer?: NodeJS.Timeout;

  constructor(
    private readonly source: UserDataSource,
    private readonly logger: EnhancedLogger
  ) {
    super();
  }

  public get username(): string {
    return this.source.username;
  }

  public get data(): UserData | null {
    return this.currentData;
  }

  public get lastUpdated(): Date | null {
    return this.updated;
  }

  public get lastUpdateSuccess(): boolean {
    return this.success;
  }

  /**
   * Fetch fresh data. Calls made while a fetch is running share its result.
   * @returns The current data, which is the previous data when the fetch failed
   */
  public refresh(): Promise<UserData | null> {
    if (!this.inFlight) {
      this.inFlight = this.fetch().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async fetch(): Promise<UserData | null> {
    this.logger.debug(`Refreshing data for ${this.username}`, LogContext.COORDINATOR);

    let data: UserData | null = null;
    let failure: Error | null = null;
    try {
      data = await this.source.getUserData();
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error));
    }

    if (data) {
      this.currentData = data;
      this.updated = new Date();
      this.success = true;
      this.logger.debug(`Data updated for ${this.username}`, LogContext.COORDINATOR);
      this.emit('update', data);
      return data;
    }

    const reason = failure ? failure.message : 'no data returned';
    if (this.currentData) {
      this.logger.warn(
        `Refresh failed for ${this.username} (${reason}), keeping data from ${this.updated?.toISOString() ?? 'earlier'}`,
        LogContext.COORDINATOR
      );
    } else {
      this.success = false;
      this.logger.error(`Failed to get data for ${this.username}: ${reason}`, LogContext.COORDINATOR);
    }
    this.emit('failed', failure ?? new Error(`Failed to get data for ${this.username}`));
    return this.currentData;
  }

  /**
   * Poll every `intervalMs`, replacing any previous schedule
   */
  public start(intervalMs: number): void {
    this.stop();
    this.pollTimer = setInterval(() => {
      this.refresh().catch(error => {
        this.logger.error(
          `Error polling ${this.username}: ${error instanceof Error ? error.message : String(error)}`,
          LogContext.COORDINATOR
        );
      });
    }, intervalMs);
    this.logger.debug(`Polling ${this.username} every ${Math.round(intervalMs / 1000)} seconds`, LogContext.COORDINATOR);
  }

  public stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
  }

  /**
   * Reflect a newly logged flight before the next poll confirms it
   * @param minutes Flight minutes to add to the total
   * @param entryDate UNIX seconds of the flight
   */
  public applyLoggedFlight(minutes: number, entryDate: number): void {
    if (!this.currentData) {
      return;
    }

    const current = this.currentData.totalFlightTime
      ? parseFlightTime(this.currentData.totalFlightTime)
      : null;
    if (this.currentData.totalFlightTime && !current) {
      this.logger.warn(
        `Could not parse total flight time '${this.currentData.totalFlightTime}', counting from zero`,
        LogContext.COORDINATOR
      );
    }

    const total = (current ? current.hours * 60 + current.minutes : 0) + minutes;
    const data: UserData = {
      ...this.currentData,
      totalFlightTime: formatFlightTime(total),
      totalFlightTimeHours: Math.floor(total / 60),
      totalFlightTimeMinutes: total % 60,
      lastFlight: entryDate,
    };

    this.currentData = data;
    this.logger.info(
      `Updated total flight time for ${this.username} to ${data.totalFlightTime}`,
      LogContext.COORDINATOR
    );
    this.emit('update', data);
  }
}
