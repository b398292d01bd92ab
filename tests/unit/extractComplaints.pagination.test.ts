import {
  createComplaintLoader,
  extractAndLoadComplaints
} from "../../src/application/extract-complaints/extractComplaints.usecase";
import { ExtractionError } from "../../src/application/extract-complaints/extraction.error-handler";
import type { ComplaintDoc, ComplaintRepository } from "../../src/ports/ComplaintRepository";
import type {
  ComplaintsApiClient,
  FetchComplaintsParams,
  TotalRelation
} from "../../src/ports/ComplaintsApiClient";

const request = { company: "ACME BANK", dateMin: "2024-01-01", dateMax: "2024-01-10" };

type PagedClientOptions = {
  reportedTotal?: number;
  totalRelation?: TotalRelation;
  invalidIds?: number[];
  malformedIds?: number[];
};

const createPagedClient = (total: number, opts: PagedClientOptions = {}) => {
  const calls: FetchComplaintsParams[] = [];

  const client: ComplaintsApiClient = {
    fetchComplaints: async (params) => {
      calls.push(params);

      const end = Math.min(total, params.from + params.size);
      const hits: unknown[] = [];
      for (let id = params.from + 1; id <= end; id += 1) {
        if (opts.malformedIds?.includes(id)) {
          hits.push("junk");
          continue;
        }
        const complaintId = opts.invalidIds?.includes(id) ? "n/a" : id;
        hits.push({ _source: { complaint_id: complaintId, company: params.company, date_received: "2024-01-02" } });
      }

      return { hits, total: opts.reportedTotal ?? total, totalRelation: opts.totalRelation ?? "eq" };
    }
  };

  return { client, calls };
};

const createCapturingRepo = () => {
  const batches: ComplaintDoc[][] = [];

  const repo: ComplaintRepository = {
    upsertMany: async (docs) => {
      batches.push(docs);
      return { upserted: docs.length, modified: 0 };
    }
  };

  return { repo, batches };
};

describe("extractAndLoadComplaints pagination", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("loads multiple pages and stops on the short last page", async () => {
    const { client, calls } = createPagedClient(45);
    const { repo, batches } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(calls.map((call) => call.from)).toEqual([0, 10, 20, 30, 40]);
    expect(calls.every((call) => call.size === 10)).toBe(true);
    expect(batches.map((batch) => batch.length)).toEqual([10, 10, 10, 10, 5]);
    expect(info).toEqual({
      company: "ACME BANK",
      dateRange: { dateMin: "2024-01-01", dateMax: "2024-01-10" },
      pagesProcessed: 5,
      loaded: 45,
      skippedInvalid: 0,
      upserted: 45,
      modified: 0
    });
  });

  it("passes company and window through to every request", async () => {
    const { client, calls } = createPagedClient(3);
    const { repo } = createCapturingRepo();

    await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(calls).toEqual([
      { company: "ACME BANK", dateReceivedMin: "2024-01-01", dateReceivedMax: "2024-01-10", size: 10, from: 0 }
    ]);
  });

  it("stops once the reported total is reached without a trailing request", async () => {
    const { client, calls } = createPagedClient(20);
    const { repo, batches } = createCapturingRepo();

    await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(calls.map((call) => call.from)).toEqual([0, 10]);
    expect(batches.map((batch) => batch.length)).toEqual([10, 10]);
  });

  it("fetches a trailing empty page when the total is under-reported", async () => {
    const { client, calls } = createPagedClient(20, { reportedTotal: 100 });
    const { repo, batches } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(calls.map((call) => call.from)).toEqual([0, 10, 20]);
    expect(batches).toHaveLength(2);
    expect(info.pagesProcessed).toBe(2);
  });

  it("returns an empty result for a company with no complaints", async () => {
    const { client, calls } = createPagedClient(0);
    const { repo, batches } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo }, request);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.size).toBe(1000);
    expect(batches).toHaveLength(0);
    expect(info).toMatchObject({ pagesProcessed: 0, loaded: 0, upserted: 0 });
  });

  it("fails with page_limit_reached when maxPages runs out before the window is exhausted", async () => {
    const { client, calls } = createPagedClient(100);
    const { repo, batches } = createCapturingRepo();

    const error = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10, maxPages: 3 } }, request).catch(
      (err: unknown) => err
    );

    expect(calls.map((call) => call.from)).toEqual([0, 10, 20]);
    expect(batches).toHaveLength(3);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      code: "page_limit_reached",
      message: "Page limit of 3 reached for ACME BANK with 30 of 100 complaints read",
      context: { company: "ACME BANK", page: 3, offset: 30 }
    });
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("completes when the last allowed page also reaches the total", async () => {
    const { client, calls } = createPagedClient(30);
    const { repo } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10, maxPages: 3 } }, request);

    expect(calls.map((call) => call.from)).toEqual([0, 10, 20]);
    expect(info).toMatchObject({ pagesProcessed: 3, loaded: 30 });
  });

  it("fails with result_total_capped when a lower-bound total is reached on a full page", async () => {
    const { client, calls } = createPagedClient(50, { reportedTotal: 20, totalRelation: "gte" });
    const { repo } = createCapturingRepo();

    await expect(extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request)).rejects.toMatchObject({
      code: "result_total_capped",
      message: "CFPB reported at least 20 complaints for ACME BANK and stopped counting; 20 were read",
      context: { company: "ACME BANK", page: 2, offset: 20 }
    });
    expect(calls.map((call) => call.from)).toEqual([0, 10]);
  });

  it("completes under a lower-bound total when a short page ends the window", async () => {
    const { client } = createPagedClient(15, { reportedTotal: 15, totalRelation: "gte" });
    const { repo } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(info).toMatchObject({ pagesProcessed: 2, loaded: 15 });
  });

  it("counts malformed hits toward the offset and skips them", async () => {
    const { client, calls } = createPagedClient(15, { malformedIds: [3] });
    const { repo, batches } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(calls.map((call) => call.from)).toEqual([0, 10]);
    expect(batches.map((batch) => batch.length)).toEqual([9, 5]);
    expect(info).toMatchObject({ pagesProcessed: 2, loaded: 14, skippedInvalid: 1 });
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toEqual({
      event: "extract.complaint_skipped",
      company: "ACME BANK",
      reason: "Invalid complaint: search hit is not an object",
      offset: 0,
      index: 2,
      skippedCount: 1
    });
  });

  it("skips complaints without a usable id and keeps the page", async () => {
    const { client } = createPagedClient(5, { invalidIds: [2, 4] });
    const { repo, batches } = createCapturingRepo();

    const info = await extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request);

    expect(batches[0]?.map((doc) => doc.complaintId)).toEqual(["1", "3", "5"]);
    expect(info).toMatchObject({ loaded: 3, skippedInvalid: 2 });
    expect(JSON.parse(String(warnSpy.mock.calls[1]?.[0]))).toEqual({
      event: "extract.complaint_skipped",
      company: "ACME BANK",
      reason: "Invalid complaint: complaint_id is not numeric",
      offset: 0,
      index: 3,
      skippedCount: 2
    });
  });

  it("wraps client failures as fetch_failed with the page context", async () => {
    const client: ComplaintsApiClient = {
      fetchComplaints: async () => {
        throw Object.assign(new Error("CFPB request failed: 503"), { status: 503 });
      }
    };
    const { repo } = createCapturingRepo();

    const error = await extractAndLoadComplaints({ client, repo }, request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      code: "fetch_failed",
      message: "CFPB request failed for ACME BANK at page=1, offset=0: CFPB request failed: 503",
      context: { company: "ACME BANK", page: 1, offset: 0, status: 503 }
    });
  });

  it("wraps repository failures as repository_write_failed", async () => {
    const { client } = createPagedClient(15);
    let writes = 0;
    const repo: ComplaintRepository = {
      upsertMany: async (docs) => {
        writes += 1;
        if (writes === 2) throw new Error("E11000 duplicate key");
        return { upserted: docs.length, modified: 0 };
      }
    };

    await expect(extractAndLoadComplaints({ client, repo, config: { pageSize: 10 } }, request)).rejects.toMatchObject({
      code: "repository_write_failed",
      context: { company: "ACME BANK", page: 2, offset: 10 }
    });
  });

  it("logs extract.completed with the extraction info", async () => {
    const { client } = createPagedClient(2);
    const { repo } = createCapturingRepo();

    await extractAndLoadComplaints({ client, repo }, request);

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toMatchObject({
      event: "extract.completed",
      company: "ACME BANK",
      loaded: 2
    });
  });

  it("binds client and repository into a ComplaintLoader", async () => {
    const { client, calls } = createPagedClient(1);
    const { repo } = createCapturingRepo();

    const loader = createComplaintLoader({ client, repo });
    const info = await loader.extractAndLoad({ company: "GLOBEX FINANCIAL", dateMin: "2024-02-01", dateMax: "2024-02-01" });

    expect(calls[0]).toMatchObject({ company: "GLOBEX FINANCIAL", dateReceivedMin: "2024-02-01" });
    expect(info.loaded).toBe(1);
  });
});
