import http from "http";
import { URL } from "url";
import { addDays, compareIsoDates, isIsoDate } from "./shared/dates/calendarDate";

/**
 * Minimal fake of the CFPB complaint search API for local runs and tests.
 * - GET /?company=...&date_received_min=...&date_received_max=...&size=...&frm=...
 * Every known company gets `perDay` complaints per calendar day, with stable ids.
 * `date_received_max` is exclusive, like the real API.
 */
export type FakeCfpbOptions = {
  companies: readonly string[];
  perDay?: number;
  failingCompanies?: readonly string[];
};

const dayNumber = (date: string) => date.replace(/-/g, "");

export const buildFakeComplaints = (
  options: FakeCfpbOptions,
  company: string,
  dateMin: string,
  dateMaxExclusive: string
): Array<Record<string, unknown>> => {
  const companyIndex = options.companies.indexOf(company);
  if (companyIndex < 0) return [];

  const perDay = options.perDay ?? 3;
  const complaints: Array<Record<string, unknown>> = [];
  for (let day = dateMin; compareIsoDates(day, dateMaxExclusive) < 0; day = addDays(day, 1)) {
    for (let k = 0; k < perDay; k += 1) {
      complaints.push({
        complaint_id: `${companyIndex + 1}${dayNumber(day)}${String(k).padStart(2, "0")}`,
        company,
        date_received: `${day}T12:00:00-05:00`,
        product: "Credit card",
        issue: "Billing dispute",
        state: "CA"
      });
    }
  }
  return complaints;
};

export const createFakeCfpbServer = (options: FakeCfpbOptions) =>
  http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const company = url.searchParams.get("company") ?? "";
    const dateMin = url.searchParams.get("date_received_min") ?? "";
    const dateMax = url.searchParams.get("date_received_max") ?? "";

    if (!isIsoDate(dateMin) || !isIsoDate(dateMax)) {
      res.writeHead(400, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "invalid date range" }));
    }

    if (options.failingCompanies?.includes(company)) {
      res.writeHead(500, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "upstream failure" }));
    }

    const size = Number(url.searchParams.get("size") ?? "10");
    const from = Number(url.searchParams.get("frm") ?? "0");
    const all = buildFakeComplaints(options, company, dateMin, dateMax);
    const page = all.slice(from, from + size).map((source) => ({ _source: source }));

    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ hits: { total: { value: all.length, relation: "eq" }, hits: page } }));
  });

if (require.main === module) {
  const port = Number(process.env.FAKE_CFPB_PORT ?? 3999);
  const companies = (process.env.CFPB_COMPANIES ?? "ACME BANK;GLOBEX FINANCIAL").split(";").map((c) => c.trim());
  const failingCompanies = (process.env.FAKE_CFPB_FAIL ?? "").split(";").filter((c) => c.trim() !== "");

  createFakeCfpbServer({ companies, failingCompanies }).listen(port, () => {
    console.log(`Fake CFPB server on http://localhost:${port}`);
  });
}
