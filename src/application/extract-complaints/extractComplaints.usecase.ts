import { transformComplaint } from "../../core/complaint/transformComplaint";
import type { ComplaintDoc } from "../../core/complaint/complaint.types";
import type { ComplaintLoader, ExtractionInfo, ExtractionRequest } from "../../ports/ComplaintLoader";
import type { ComplaintRepository } from "../../ports/ComplaintRepository";
import type { ComplaintsApiClient, ComplaintsPage } from "../../ports/ComplaintsApiClient";
import type { ExtractorConfigInput } from "./extractor.config";
import { resolveExtractorConfig } from "./extractor.config";
import {
  classifyTransformFailure,
  createExtractionProgressTracker,
  pageLimitReached,
  resultTotalCapped,
  wrapFetchFailure,
  wrapRepositoryFailure
} from "./extraction.error-handler";

export type ExtractComplaintsDeps = {
  client: ComplaintsApiClient;
  repo: ComplaintRepository;
  config?: ExtractorConfigInput;
};

/**
 * Pages through one company's complaints for the window and upserts each page.
 * Invalid hits are skipped; anything else aborts this company with an ExtractionError,
 * including running out of pages (or of a capped total) before the window is exhausted.
 */
export const extractAndLoadComplaints = async (
  deps: ExtractComplaintsDeps,
  request: ExtractionRequest
): Promise<ExtractionInfo> => {
  const { client, repo } = deps;
  const config = resolveExtractorConfig(deps.config);
  const { company, dateMin, dateMax } = request;
  const tracker = createExtractionProgressTracker();
  let offset = 0;
  let total = 0;
  let exhausted = false;

  while (tracker.pagesProcessed() < config.maxPages) {
    const page = tracker.nextPageNumber();

    let result: ComplaintsPage;
    try {
      result = await client.fetchComplaints({
        company,
        dateReceivedMin: dateMin,
        dateReceivedMax: dateMax,
        size: config.pageSize,
        from: offset
      });
    } catch (error) {
      throw wrapFetchFailure(error, { company, page, offset });
    }

    const { hits } = result;
    total = result.total;
    if (hits.length === 0) {
      exhausted = true;
      break;
    }

    const docs = hits.flatMap((hit, index): ComplaintDoc[] => {
      try {
        return [transformComplaint(hit, company)];
      } catch (reason) {
        const decision = classifyTransformFailure(reason, { company, page, offset, index });
        if (decision.action === "fail") throw decision.error;

        const skippedCount = tracker.addSkipped();
        console.warn(JSON.stringify({ ...decision.log, skippedCount }));
        return [];
      }
    });

    let written = { upserted: 0, modified: 0 };
    if (docs.length > 0) {
      try {
        written = await repo.upsertMany(docs);
      } catch (error) {
        throw wrapRepositoryFailure(error, { company, page, offset });
      }
    }

    tracker.addPage({ loaded: docs.length, ...written });
    offset += hits.length;

    if (hits.length < config.pageSize) {
      exhausted = true;
      break;
    }
    if (offset >= total) {
      if (result.totalRelation === "gte") throw resultTotalCapped({ company, page, offset, total });
      exhausted = true;
      break;
    }
  }

  if (!exhausted) {
    throw pageLimitReached({ company, page: tracker.pagesProcessed(), offset, total, maxPages: config.maxPages });
  }

  const info: ExtractionInfo = {
    company,
    dateRange: { dateMin, dateMax },
    ...tracker.snapshot()
  };
  console.log(JSON.stringify({ event: "extract.completed", ...info }));
  return info;
};

/** Binds the extract+load use case to a client and repository. */
export const createComplaintLoader = (deps: ExtractComplaintsDeps): ComplaintLoader => ({
  extractAndLoad: (request) => extractAndLoadComplaints(deps, request)
});
