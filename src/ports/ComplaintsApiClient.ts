export type FetchComplaintsParams = {
  company: string;
  dateReceivedMin: string; // YYYY-MM-DD, inclusive
  dateReceivedMax: string; // YYYY-MM-DD, inclusive
  size: number;
  from: number;
};

/** `gte` means the search stopped counting and `total` is only a lower bound. */
export type TotalRelation = "eq" | "gte";

export type ComplaintsPage = {
  // unvalidated; malformed entries count toward paging and are skipped on transform
  hits: unknown[];
  total: number;
  totalRelation: TotalRelation;
};

export interface ComplaintsApiClient {
  fetchComplaints(params: FetchComplaintsParams): Promise<ComplaintsPage>;
}
