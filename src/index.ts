// Entrypoint for the ParseHub client
// - Default export: ParseHubClient
// - Error classes, header helpers, the axios transport and public types

export { ParseHubClient } from "./client";
export type { ParseHubClientOptions } from "./client";
export * from "./types";
export * from "./utils/errors";
export { parseHeaders, getHeader } from "./utils/headers";
export type { HeaderMap } from "./utils/headers";
export { AxiosTransport } from "./utils/transport";
export type { Transport, TransportRequest, TransportResponse, AxiosTransportOptions } from "./utils/transport";
export type { GetProjectOptions, RunProjectOptions, ListProjectsOptions, DataOptions } from "./methods/projects";
export type { WaitForRunOptions } from "./methods/runs";
export type { RunSnapshot } from "./utils/validation";
export { DEFAULT_API_URL } from "./utils/constants";

import { ParseHubClient } from "./client";

export default ParseHubClient;
