import { z } from "zod";
import { ConfigurationError, InvalidArgumentError } from "./errors";

// "0" counts as unset, as it always has for ParseHub keys and tokens.
function isBlank(value: string): boolean {
  return !value || value === "0";
}

export function ensureApiKey(apiKey: string): void {
  if (isBlank(apiKey)) {
    throw new ConfigurationError("API key must be set before calling");
  }
}

export function ensureToken(token: string, kind: "project" | "run"): void {
  if (isBlank(token)) {
    throw new InvalidArgumentError(`Invalid ${kind} token provided`);
  }
}

export const runStatusSchema = z.enum(["initialized", "queued", "running", "cancelled", "complete", "error"]);

// Only the fields the run waiter reads; everything else passes through.
export const runSnapshotSchema = z
  .object({
    run_token: z.string().optional(),
    status: runStatusSchema,
    data_ready: z.union([z.number(), z.boolean()]).optional(),
  })
  .passthrough();

export type RunSnapshot = z.infer<typeof runSnapshotSchema>;
