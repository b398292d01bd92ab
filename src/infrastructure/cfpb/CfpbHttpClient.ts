import type { ComplaintsApiClient, ComplaintsPage, FetchComplaintsParams } from "../../ports/ComplaintsApiClient";
import { addDays } from "../../shared/dates/calendarDate";
import { retry } from "../../shared/retry/retry";

export class CfpbRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; retryDelayMs?: number }) {
    super(args.message);
    this.name = "CfpbRequestError";
    this.requestUrl = args.requestUrl;
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryDelayMs = args.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseRetryAfterMs = (header: string | null): number | undefined =>
  header && /^\d+$/.test(header) ? Number(header) * 1000 : undefined;

export class CfpbResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CfpbResponseError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Accepts the search API payload `{ hits: { total, hits: [...] } }`, where `total`
 * is a number on older deployments and `{ value, relation }` on newer ones.
 */
export const parseSearchResponse = (json: unknown): ComplaintsPage => {
  const outer = isRecord(json) ? json.hits : undefined;
  const rawHits = isRecord(outer) ? outer.hits : undefined;
  if (!isRecord(outer) || !Array.isArray(rawHits)) {
    throw new CfpbResponseError("CFPB response is not a search result");
  }

  const rawTotal = outer.total;
  if (typeof rawTotal === "number") {
    return { hits: rawHits, total: rawTotal, totalRelation: "eq" };
  }
  if (isRecord(rawTotal) && typeof rawTotal.value === "number") {
    return { hits: rawHits, total: rawTotal.value, totalRelation: rawTotal.relation === "gte" ? "gte" : "eq" };
  }

  return { hits: rawHits, total: rawHits.length, totalRelation: "eq" };
};

/**
 * Client for the CFPB consumer complaint search API, using native fetch (Node 20).
 */
export class CfpbHttpClient implements ComplaintsApiClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 15000
  ) {}

  buildSearchUrl(params: FetchComplaintsParams): URL {
    const url = new URL(this.baseUrl);
    if (!url.pathname.endsWith("/")) url.pathname = `${url.pathname}/`;

    url.searchParams.set("format", "json");
    url.searchParams.set("no_aggs", "true");
    url.searchParams.set("sort", "created_date_asc");
    url.searchParams.set("company", params.company);
    url.searchParams.set("date_received_min", params.dateReceivedMin);
    // the API's upper bound is exclusive
    url.searchParams.set("date_received_max", addDays(params.dateReceivedMax, 1));
    url.searchParams.set("size", String(params.size));
    url.searchParams.set("frm", String(params.from));
    return url;
  }

  async fetchComplaints(params: FetchComplaintsParams): Promise<ComplaintsPage> {
    const url = this.buildSearchUrl(params);
    const requestUrl = `${url.origin}${url.pathname}${url.search}`;

    const doFetch = async (): Promise<ComplaintsPage> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      let res: Response;
      try {
        res = await fetch(url, {
          headers: { accept: "application/json" },
          signal: controller.signal
        });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new CfpbRequestError({
            message: `CFPB request timeout after ${this.timeoutMs}ms`,
            requestUrl,
            isTimeout: true
          });
        }
        throw err;
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        throw new CfpbRequestError({
          message: `CFPB request failed: ${res.status}`,
          requestUrl,
          status: res.status,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined
        });
      }

      return parseSearchResponse(await res.json());
    };

    const logAttempt = (event: "http.retry" | "http.give_up", attempt: number, maxAttempts: number, error: unknown) => {
      console.warn(
        JSON.stringify({
          event,
          status: error instanceof CfpbRequestError ? error.status ?? null : null,
          url: requestUrl,
          attempt,
          maxAttempts
        })
      );
    };

    return retry(doFetch, {
      retries: 5,
      minDelayMs: 250,
      maxDelayMs: 5000,
      onRetry: ({ attempt, maxAttempts, error }) => logAttempt("http.retry", attempt, maxAttempts, error),
      onGiveUp: ({ attempt, maxAttempts, error }) => logAttempt("http.give_up", attempt, maxAttempts, error),
      shouldRetry: (err) => {
        if (err instanceof CfpbResponseError || err instanceof SyntaxError) return false;
        // anything else thrown by fetch itself is a network failure
        if (!(err instanceof CfpbRequestError)) return true;
        if (err.isTimeout) return true;

        const status = err.status;
        if (status === 429) return { retry: true, delayMs: err.retryDelayMs };
        return typeof status === "number" && status >= 500;
      }
    });
  }
}
