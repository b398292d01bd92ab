import type { LoadWindow } from "../../ports/ComplaintLoader";
import type { WatermarkStorage } from "../../ports/WatermarkStorage";
import { createLimiter } from "../../shared/concurrency/limiter";
import {
  addDays,
  isIsoDate,
  parseIsoDate,
  systemToday,
  type IsoDate,
  type TodayProvider
} from "../../shared/dates/calendarDate";
import { PersistenceError, toErrorMessage, type PersistenceOperation } from "../../shared/errors/errors";

const wrapStorageFailure = (operation: PersistenceOperation, reason: unknown): PersistenceError => {
  if (reason instanceof PersistenceError) return reason;
  return new PersistenceError({
    operation,
    message: `Watermark ${operation} failed: ${toErrorMessage(reason)}`,
    cause: reason
  });
};

/**
 * Owns the `last_loaded_date` watermark and derives the next load window from it.
 * Operations on one instance never interleave.
 */
export class WatermarkStore {
  private readonly serial = createLimiter(1);

  constructor(
    private readonly storage: WatermarkStorage,
    private readonly today: TodayProvider = systemToday
  ) {}

  getLastLoadedDate(): Promise<IsoDate | undefined> {
    return this.serial(() => this.readWatermark());
  }

  /**
   * `(startDate, today)` on the first run, `(watermark + 1 day, today)` after.
   * `dateMin > dateMax` means there is nothing to load yet.
   */
  async getNextLoadDate(startDate: string, today: IsoDate = this.today()): Promise<LoadWindow> {
    const start = parseIsoDate("startDate", startDate);
    const dateMax = parseIsoDate("today", today);

    const lastLoaded = await this.getLastLoadedDate();
    const dateMin = lastLoaded === undefined ? start : addDays(lastLoaded, 1);
    return { dateMin, dateMax };
  }

  updateLastLoadedDate(dateMax: IsoDate): Promise<void> {
    if (!isIsoDate(dateMax)) {
      return Promise.reject(
        new PersistenceError({ operation: "write", message: `Refusing to persist invalid watermark: ${dateMax}` })
      );
    }

    return this.serial(async () => {
      try {
        await this.storage.write(dateMax);
      } catch (err) {
        throw wrapStorageFailure("write", err);
      }
    });
  }

  resetState(): Promise<void> {
    return this.serial(async () => {
      try {
        await this.storage.clear();
      } catch (err) {
        throw wrapStorageFailure("clear", err);
      }
    });
  }

  private async readWatermark(): Promise<IsoDate | undefined> {
    let stored: string | undefined;
    try {
      stored = await this.storage.read();
    } catch (err) {
      throw wrapStorageFailure("read", err);
    }

    if (stored === undefined) return undefined;
    if (!isIsoDate(stored)) {
      throw new PersistenceError({ operation: "read", message: `Stored watermark is not a calendar date: ${stored}` });
    }
    return stored;
  }
}
