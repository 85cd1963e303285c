import type { DataFormat, RequestDescriptor, RequestParams } from "../types";
import { MAX_PROJECT_LIST_LIMIT } from "../utils/constants";
import { ensureApiKey, ensureToken } from "../utils/validation";

export interface GetProjectOptions {
  /** Offset into the project's run list, e.g. 20 for runs 21-40. */
  offset?: number;
  /** Include `options_json` in the result. */
  includeOptions?: boolean;
}

export interface RunProjectOptions {
  /** Overrides the project's start site. */
  startUrl?: string;
  /** Overrides the project's start template. */
  startTemplate?: string;
  /**
   * Starting global scope for the run, e.g. `{ query: "San Francisco" }`.
   * Objects are sent as JSON. Only sent together with `startUrl`.
   */
  startValueOverride?: string | Record<string, unknown>;
  /** Email when the run completes or fails. */
  sendEmail?: boolean;
}

export interface ListProjectsOptions {
  offset?: number;
  /** Page size, 1 to 20. Out-of-range values are left for the server to reject. */
  limit?: number;
  /** Adds options_json, main_template, main_site and webhook to each entry. */
  includeOptions?: boolean;
}

export interface DataOptions {
  format?: DataFormat;
}

function projectPath(projectToken: string, suffix = ""): string {
  return `/projects/${encodeURIComponent(projectToken)}${suffix}`;
}

export function prepareGetProject(apiKey: string, projectToken: string, options: GetProjectOptions = {}): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(projectToken, "project");
  return {
    method: "GET",
    path: projectPath(projectToken),
    action: "get project",
    params: {
      api_key: apiKey,
      offset: options.offset ?? 0,
      include_options: options.includeOptions ?? false,
    },
  };
}

export function prepareRunProject(apiKey: string, projectToken: string, options: RunProjectOptions = {}): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(projectToken, "project");
  const params: RequestParams = { api_key: apiKey };
  if (options.startUrl) params.start_url = options.startUrl;
  if (options.startTemplate) params.start_template = options.startTemplate;
  // start_value_override travels with start_url, whatever the override holds.
  if (options.startUrl) {
    const override = options.startValueOverride ?? "";
    params.start_value_override = typeof override === "string" ? override : JSON.stringify(override);
  }
  params.send_email = options.sendEmail ?? false;
  return { method: "POST", path: projectPath(projectToken, "/run"), action: "run project", params };
}

export function prepareListProjects(apiKey: string, options: ListProjectsOptions = {}): RequestDescriptor {
  ensureApiKey(apiKey);
  return {
    method: "GET",
    path: "/projects",
    action: "list projects",
    params: {
      api_key: apiKey,
      offset: options.offset ?? 0,
      limit: options.limit ?? MAX_PROJECT_LIST_LIMIT,
      include_options: options.includeOptions ?? false,
    },
  };
}

export function prepareGetLastReadyData(apiKey: string, projectToken: string, options: DataOptions = {}): RequestDescriptor {
  ensureApiKey(apiKey);
  ensureToken(projectToken, "project");
  return {
    method: "GET",
    path: projectPath(projectToken, "/last_ready_run/data"),
    action: "get last ready run data",
    params: { api_key: apiKey, format: options.format ?? "json" },
  };
}
