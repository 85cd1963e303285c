import { HttpClient } from "./utils/httpClient";
import { AxiosTransport, type Transport } from "./utils/transport";
import { logger as defaultLogger, type Logger } from "./utils/logger";
import { DEFAULT_API_URL } from "./utils/constants";
import type { RunSnapshot } from "./utils/validation";
import {
  prepareGetLastReadyData,
  prepareGetProject,
  prepareListProjects,
  prepareRunProject,
  type DataOptions,
  type GetProjectOptions,
  type ListProjectsOptions,
  type RunProjectOptions,
} from "./methods/projects";
import {
  prepareCancelRun,
  prepareDeleteRun,
  prepareGetRun,
  prepareGetRunData,
  waitForRunCompletion,
  type WaitForRunOptions,
} from "./methods/runs";
import type {
  Decoded,
  DecodeOption,
  DeletedRun,
  Envelope,
  JsonOption,
  Project,
  ProjectList,
  RawEnvelope,
  RawOption,
  Run,
  RunData,
} from "./types";

/**
 * Configuration for the client transport.
 */
export interface ParseHubClientOptions {
  /** API base URL (defaults to https://parsehub.com/api/v2). */
  apiUrl?: string;
  /** Replaces the default axios transport. */
  transport?: Transport;
  /** Per-request timeout in milliseconds for the default transport; 0 (the default) disables it. */
  timeoutMs?: number;
  /** winston logger to derive module loggers from. */
  logger?: Logger;
}

/**
 * ParseHub API client. Each method performs exactly one request.
 *
 * Without `decodeJSON` every method resolves to `{ raw }` holding the body
 * text. With `decodeJSON: true` it resolves to the parsed body, or `{}` when
 * the body is not a JSON object or array.
 */
export class ParseHubClient {
  private apiKey: string;
  private readonly http: HttpClient;

  /**
   * @param apiKey API key; an empty string leaves it unset until {@link setApiKey}.
   * @param options Transport configuration (base URL, custom transport, timeout, logger).
   */
  constructor(apiKey = "", options: ParseHubClientOptions = {}) {
    this.apiKey = apiKey;
    this.http = new HttpClient({
      apiUrl: options.apiUrl ?? DEFAULT_API_URL,
      transport: options.transport ?? new AxiosTransport({ timeoutMs: options.timeoutMs }),
      logger: options.logger ?? defaultLogger,
    });
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  getApiUrl(): string {
    return this.http.getApiUrl();
  }

  // Projects
  /**
   * Get a project, with up to 20 of its most recent runs in `run_list`
   * starting at `offset`. The run list is unordered.
   * @param projectToken Project token.
   */
  getProject(projectToken: string, options?: GetProjectOptions & RawOption): Promise<RawEnvelope>;
  getProject(projectToken: string, options: GetProjectOptions & JsonOption): Promise<Decoded<Project>>;
  getProject(projectToken: string, options?: GetProjectOptions & DecodeOption): Promise<Envelope<Project>>;
  async getProject(projectToken: string, options: GetProjectOptions & DecodeOption = {}): Promise<Envelope<Project>> {
    return this.http.execute<Project>(prepareGetProject(this.apiKey, projectToken, options), options.decodeJSON ?? false);
  }

  /**
   * Start a run of the project. Resolves as soon as the run object is
   * created; the run continues on the service.
   * @param projectToken Project token.
   * @param options Start URL, template and global scope overrides, email notification.
   */
  runProject(projectToken: string, options?: RunProjectOptions & RawOption): Promise<RawEnvelope>;
  runProject(projectToken: string, options: RunProjectOptions & JsonOption): Promise<Decoded<Run>>;
  runProject(projectToken: string, options?: RunProjectOptions & DecodeOption): Promise<Envelope<Run>>;
  async runProject(projectToken: string, options: RunProjectOptions & DecodeOption = {}): Promise<Envelope<Run>> {
    return this.http.execute<Run>(prepareRunProject(this.apiKey, projectToken, options), options.decodeJSON ?? false);
  }

  /**
   * List the projects in the account.
   */
  listProjects(options?: ListProjectsOptions & RawOption): Promise<RawEnvelope>;
  listProjects(options: ListProjectsOptions & JsonOption): Promise<Decoded<ProjectList>>;
  listProjects(options?: ListProjectsOptions & DecodeOption): Promise<Envelope<ProjectList>>;
  async listProjects(options: ListProjectsOptions & DecodeOption = {}): Promise<Envelope<ProjectList>> {
    return this.http.execute<ProjectList>(prepareListProjects(this.apiKey, options), options.decodeJSON ?? false);
  }

  /**
   * Data of the project's most recent run that has data ready.
   * @param projectToken Project token.
   */
  getLastReadyData(projectToken: string, options?: DataOptions & RawOption): Promise<RawEnvelope>;
  getLastReadyData(projectToken: string, options: DataOptions & JsonOption): Promise<Decoded<RunData>>;
  getLastReadyData(projectToken: string, options?: DataOptions & DecodeOption): Promise<Envelope<RunData>>;
  async getLastReadyData(projectToken: string, options: DataOptions & DecodeOption = {}): Promise<Envelope<RunData>> {
    return this.http.execute<RunData>(prepareGetLastReadyData(this.apiKey, projectToken, options), options.decodeJSON ?? false);
  }

  // Runs
  /**
   * Get a run. The service rate-limits this call per run: at most 25 calls in
   * the first 5 minutes after the run started, then one every 3 minutes.
   * @param runToken Run token.
   */
  getRun(runToken: string, options?: RawOption): Promise<RawEnvelope>;
  getRun(runToken: string, options: JsonOption): Promise<Decoded<Run>>;
  getRun(runToken: string, options?: DecodeOption): Promise<Envelope<Run>>;
  async getRun(runToken: string, options: DecodeOption = {}): Promise<Envelope<Run>> {
    return this.http.execute<Run>(prepareGetRun(this.apiKey, runToken), options.decodeJSON ?? false);
  }

  /**
   * Data extracted by a run, as JSON or CSV. The service always gzips it.
   * @param runToken Run token.
   */
  getRunData(runToken: string, options?: DataOptions & RawOption): Promise<RawEnvelope>;
  getRunData(runToken: string, options: DataOptions & JsonOption): Promise<Decoded<RunData>>;
  getRunData(runToken: string, options?: DataOptions & DecodeOption): Promise<Envelope<RunData>>;
  async getRunData(runToken: string, options: DataOptions & DecodeOption = {}): Promise<Envelope<RunData>> {
    return this.http.execute<RunData>(prepareGetRunData(this.apiKey, runToken, options), options.decodeJSON ?? false);
  }

  /**
   * Cancel a run in progress. Data extracted so far stays available.
   * @param runToken Run token.
   */
  cancelRun(runToken: string, options?: RawOption): Promise<RawEnvelope>;
  cancelRun(runToken: string, options: JsonOption): Promise<Decoded<Run>>;
  cancelRun(runToken: string, options?: DecodeOption): Promise<Envelope<Run>>;
  async cancelRun(runToken: string, options: DecodeOption = {}): Promise<Envelope<Run>> {
    return this.http.execute<Run>(prepareCancelRun(this.apiKey, runToken), options.decodeJSON ?? false);
  }

  /**
   * Cancel the run if it is running, then delete it and its data.
   * @param runToken Run token.
   */
  deleteRun(runToken: string, options?: RawOption): Promise<RawEnvelope>;
  deleteRun(runToken: string, options: JsonOption): Promise<Decoded<DeletedRun>>;
  deleteRun(runToken: string, options?: DecodeOption): Promise<Envelope<DeletedRun>>;
  async deleteRun(runToken: string, options: DecodeOption = {}): Promise<Envelope<DeletedRun>> {
    return this.http.execute<DeletedRun>(prepareDeleteRun(this.apiKey, runToken), options.decodeJSON ?? false);
  }

  /**
   * Convenience waiter: poll a run until it is complete, errored or cancelled.
   * @param runToken Run token.
   * @param options Poll interval and timeout, both in seconds.
   * @returns Final run snapshot.
   */
  async waitForRun(runToken: string, options: WaitForRunOptions = {}): Promise<RunSnapshot> {
    return waitForRunCompletion((token) => this.getRun(token, { decodeJSON: true }), runToken, options.pollInterval, options.timeout);
  }
}
