import { InvalidComplaintError } from "../../core/complaint/transformComplaint";
import { toErrorMessage } from "../../shared/errors/errors";

export type ExtractionSkipCode = "invalid_complaint";
export type ExtractionFailureCode =
  | "fetch_failed"
  | "transform_unexpected"
  | "repository_write_failed"
  | "page_limit_reached"
  | "result_total_capped";

export type ExtractionErrorContext = {
  company: string;
  page: number;
  offset: number;
  index?: number;
  status?: number;
};

type PagingContext = Omit<ExtractionErrorContext, "index" | "status">;

const unwrapCause = (reason: unknown): unknown => (reason instanceof Error ? reason.cause ?? reason : reason);

const readStatus = (reason: unknown): number | undefined => {
  if (typeof reason !== "object" || reason === null || !("status" in reason)) return undefined;
  const { status } = reason;
  return typeof status === "number" && Number.isFinite(status) ? status : undefined;
};

/**
 * One company's extraction failed. The run coordinator records it and moves on.
 */
export class ExtractionError extends Error {
  readonly code: ExtractionFailureCode;
  readonly context: ExtractionErrorContext;

  constructor(args: { code: ExtractionFailureCode; message: string; context: ExtractionErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "ExtractionError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type ComplaintSkippedLog = {
  event: "extract.complaint_skipped";
  company: string;
  reason: string;
  offset: number;
  index: number;
};

export type TransformFailureDecision =
  | { action: "skip"; code: ExtractionSkipCode; log: ComplaintSkippedLog }
  | { action: "fail"; error: ExtractionError };

export const classifyTransformFailure = (
  reason: unknown,
  context: Required<Pick<ExtractionErrorContext, "company" | "page" | "offset" | "index">>
): TransformFailureDecision => {
  if (reason instanceof InvalidComplaintError) {
    return {
      action: "skip",
      code: "invalid_complaint",
      log: {
        event: "extract.complaint_skipped",
        company: context.company,
        reason: reason.message,
        offset: context.offset,
        index: context.index
      }
    };
  }

  return {
    action: "fail",
    error: new ExtractionError({
      code: "transform_unexpected",
      message: `Unexpected transform failure for ${context.company} at page=${context.page}, offset=${context.offset}, index=${context.index}: ${toErrorMessage(reason)}`,
      context,
      cause: unwrapCause(reason)
    })
  };
};

export const wrapFetchFailure = (reason: unknown, context: PagingContext) => {
  const status = readStatus(reason);
  return new ExtractionError({
    code: "fetch_failed",
    message: `CFPB request failed for ${context.company} at page=${context.page}, offset=${context.offset}: ${toErrorMessage(reason)}`,
    context: status === undefined ? context : { ...context, status },
    cause: unwrapCause(reason)
  });
};

export const wrapRepositoryFailure = (reason: unknown, context: PagingContext) =>
  new ExtractionError({
    code: "repository_write_failed",
    message: `Repository write failed for ${context.company} at page=${context.page}, offset=${context.offset}: ${toErrorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });

// both raised while hits remain unread for the window
export const pageLimitReached = (context: PagingContext & { maxPages: number; total: number }) =>
  new ExtractionError({
    code: "page_limit_reached",
    message: `Page limit of ${context.maxPages} reached for ${context.company} with ${context.offset} of ${context.total} complaints read`,
    context: { company: context.company, page: context.page, offset: context.offset }
  });

export const resultTotalCapped = (context: PagingContext & { total: number }) =>
  new ExtractionError({
    code: "result_total_capped",
    message: `CFPB reported at least ${context.total} complaints for ${context.company} and stopped counting; ${context.offset} were read`,
    context: { company: context.company, page: context.page, offset: context.offset }
  });

export type ExtractionProgress = {
  pagesProcessed: number;
  loaded: number;
  skippedInvalid: number;
  upserted: number;
  modified: number;
};

export const createExtractionProgressTracker = () => {
  const progress: ExtractionProgress = {
    pagesProcessed: 0,
    loaded: 0,
    skippedInvalid: 0,
    upserted: 0,
    modified: 0
  };

  return {
    pagesProcessed: () => progress.pagesProcessed,
    nextPageNumber: () => progress.pagesProcessed + 1,
    addPage: (page: { loaded: number; upserted: number; modified: number }) => {
      progress.pagesProcessed += 1;
      progress.loaded += page.loaded;
      progress.upserted += page.upserted;
      progress.modified += page.modified;
    },
    addSkipped: () => {
      progress.skippedInvalid += 1;
      return progress.skippedInvalid;
    },
    snapshot: (): ExtractionProgress => ({ ...progress })
  };
};
