#!/usr/bin/env node
import type { RunSummary } from "../application/incremental-load/run.summary";
import { WatermarkAdvanceError } from "../application/incremental-load/run.summary";
import { readLoadState, resetLoadState, runLoad } from "../composition/root";
import type { LoadWindow } from "../ports/ComplaintLoader";
import type { PersistenceOperation } from "../shared/errors/errors";
import { ConfigurationError, PersistenceError } from "../shared/errors/errors";

export type LoadCommand = "run" | "status" | "reset-state";

// what was already upserted when the watermark write failed
type UnrecordedLoad = {
  dateRange: LoadWindow;
  totalCompanies: number;
  successful: number;
  complaintsLoaded: number;
};

type CliErrorEnvelope = {
  event: "load.failed";
  name: string;
  message: string;
  code?: string;
  operation?: PersistenceOperation;
  unrecordedLoad?: UnrecordedLoad;
  stack?: string;
};

const describeUnrecordedLoad = (error: WatermarkAdvanceError): UnrecordedLoad => {
  const { dateRange, totalCompanies, successful, results } = error.summary;
  const complaintsLoaded = results.reduce((sum, r) => (r.status === "success" ? sum + r.info.loaded : sum), 0);
  return { dateRange, totalCompanies, successful, complaintsLoaded };
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const parseCommand = (argv: readonly string[]): LoadCommand => {
  const [command = "run"] = argv;
  if (command === "run" || command === "status" || command === "reset-state") return command;
  throw new ConfigurationError(`Unknown command: ${command}. Expected one of run, status, reset-state`);
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));

  const envelope: CliErrorEnvelope = {
    event: "load.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (error instanceof PersistenceError) {
    envelope.code = error.code;
    envelope.operation = error.operation;
  }

  if (error instanceof WatermarkAdvanceError) {
    envelope.unrecordedLoad = describeUnrecordedLoad(error);
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

/** 0 when up to date or fully loaded, 2 when some company failed. */
export const exitCodeForSummary = (summary: RunSummary): number =>
  summary.status === "partial_failure" ? 2 : 0;

export const executeLoadCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  let exitCode = 0;
  try {
    const command = parseCommand(argv);

    if (command === "status") {
      const lastLoadedDate = await readLoadState();
      console.log(JSON.stringify({ event: "state.status", lastLoadedDate: lastLoadedDate ?? null }));
    } else if (command === "reset-state") {
      await resetLoadState();
      console.log(JSON.stringify({ event: "state.reset" }));
    } else {
      const summary = await runLoad();
      console.log(JSON.stringify({ event: "load.summary", ...summary }));
      exitCode = exitCodeForSummary(summary);
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }

  if (exitCode !== 0) process.exit(exitCode);
};

if (require.main === module) {
  void executeLoadCli();
}
