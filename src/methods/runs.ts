import type { Decoded, RequestDescriptor, Run } from "../types";
import { TERMINAL_RUN_STATUSES } from "../utils/constants";
import { InvalidArgumentError, RequestFailedError } from "../utils/errors";
import { ensureApiKey, ensureToken, runSnapshotSchema, type RunSnapshot } from "../utils/validation";
import type { DataOptions } from "./projects";

function runPath(runToken: string, suffix = ""): string {
  return `/runs/${encodeURIComponent(runToken)}${suffix}`;
}

export function prepareGetRun(apiKey: string, runToken: string): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(runToken, "run");
  return { method: "GET", path: runPath(runToken), action: "get run", params: { api_key: apiKey } };
}

export function prepareGetRunData(apiKey: string, runToken: string, options: DataOptions = {}): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(runToken, "run");
  return {
    method: "GET",
    path: runPath(runToken, "/data"),
    action: "get run data",
    params: { api_key: apiKey, format: options.format ?? "json" },
  };
}

export function prepareCancelRun(apiKey: string, runToken: string): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(runToken, "run");
  return { method: "POST", path: runPath(runToken, "/cancel"), action: "cancel run", params: { api_key: apiKey } };
}

export function prepareDeleteRun(apiKey: string, runToken: string): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(runToken, "run");
  return { method: "DELETE", path: runPath(runToken), action: "delete run", params: { api_key: apiKey } };
}

export interface WaitForRunOptions {
  /** Seconds between polls. The service allows one poll every 3 minutes once a run is 5 minutes old. */
  pollInterval?: number;
  /** Give up after this many seconds. */
  timeout?: number;
}

/**
 * Poll until the run reaches complete, error or cancelled, and return the
 * last snapshot.
 */
export async function waitForRunCompletion(
  fetchRun: (runToken: string) => Promise<Decoded<Run>>,
  runToken: string,
  pollInterval = 180,
  timeout?: number,
): Promise<RunSnapshot> {
  if (!Number.isFinite(pollInterval)) {
    throw new InvalidArgumentError(`pollInterval must be a finite number of seconds, got ${pollInterval}`);
  }
  const start = Date.now();
  while (true) {
    const snapshot = await fetchRun(runToken);
    const parsed = runSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new RequestFailedError(`Run ${runToken} returned an unrecognised status`, undefined, "invalid_run", parsed.error.issues);
    }
    if (TERMINAL_RUN_STATUSES.includes(parsed.data.status)) {
      return parsed.data;
    }
    if (timeout != null && Date.now() - start > timeout * 1000) {
      throw new RequestFailedError(`Run ${runToken} did not finish within ${timeout} seconds`, undefined, "timeout");
    }
    await new Promise((r) => setTimeout(r, Math.max(1000, pollInterval * 1000)));
  }
}
