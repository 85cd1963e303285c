// Public types for the ParseHub client. Field names follow the wire format.

export type HttpMethod = "GET" | "POST" | "DELETE";

export type ParamValue = string | number | boolean | undefined;

export type RequestParams = Record<string, ParamValue>;

/**
 * One endpoint call before encoding. GET and DELETE carry `params` in the
 * query string, POST in a form body.
 */
export interface RequestDescriptor {
  method: HttpMethod;
  path: string;
  params: RequestParams;
  /** Human readable name of the call, used in error messages and logs. */
  action: string;
}

export interface RawEnvelope {
  raw: string;
}

export type EmptyObject = Record<string, never>;

/** A decoded body, or `{}` when the body was not a JSON object or array. */
export type Decoded<T> = T | EmptyObject;

export type Envelope<T> = RawEnvelope | Decoded<T>;

export interface RawOption {
  decodeJSON?: false;
}

export interface JsonOption {
  decodeJSON: true;
}

export interface DecodeOption {
  decodeJSON?: boolean;
}

export type DataFormat = "json" | "csv";

export type RunStatus = "initialized" | "queued" | "running" | "cancelled" | "complete" | "error";

export interface Run {
  project_token: string;
  run_token: string;
  status: RunStatus;
  data_ready: number | boolean;
  start_time: string;
  end_time: string | null;
  pages: number;
  md5sum: string | null;
  start_url: string;
  start_template: string;
  start_value: string;
  is_empty?: boolean;
  webhook?: string;
  options_json?: string;
}

export interface Project {
  token: string;
  title: string;
  templates_json?: string;
  main_template?: string;
  main_site?: string;
  options_json?: string;
  webhook?: string;
  last_run?: Run | null;
  last_ready_run?: Run | null;
  run_list?: Run[];
}

export interface ProjectList {
  projects: Project[];
  total_projects: number;
}

/** Extracted data; its shape is defined by the project's selections. */
export type RunData = Record<string, unknown>;

export interface DeletedRun {
  run_token: string;
}
