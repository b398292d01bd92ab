/**
 * Persistence backend for the single `last_loaded_date` value.
 * `write` must replace the value atomically: readers see the old or the new
 * date, never a partial one.
 */
export interface WatermarkStorage {
  read(): Promise<string | undefined>;
  write(value: string): Promise<void>;
  clear(): Promise<void>;
}
