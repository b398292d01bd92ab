import type { IsoDate } from "../shared/dates/calendarDate";

export type LoadWindow = {
  dateMin: IsoDate;
  dateMax: IsoDate;
};

export type ExtractionRequest = LoadWindow & {
  company: string;
};

export type ExtractionInfo = {
  company: string;
  dateRange: LoadWindow;
  pagesProcessed: number;
  loaded: number;
  skippedInvalid: number;
  upserted: number;
  modified: number;
};

/**
 * Extracts one company's complaints for a window and appends them to the
 * destination. Rejects on any failure.
 */
export interface ComplaintLoader {
  extractAndLoad(request: ExtractionRequest): Promise<ExtractionInfo>;
}
