import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import type { HttpMethod } from "../types";
import { normalizeAxiosError } from "./errorHandler";

export interface TransportRequest {
  method: HttpMethod;
  /** Fully qualified URL, query string included. */
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  /** Raw header lines; the first one is the status line. */
  headerLines: string[];
  /** Body bytes exactly as received, still compressed if the server compressed them. */
  body: Buffer;
}

/**
 * Performs one HTTP exchange. Implementations return every response,
 * whatever its status, and reject only when no response was received.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface AxiosTransportOptions {
  /** Per-request timeout in milliseconds; 0 disables it. */
  timeoutMs?: number;
  /** Custom axios adapter, for environments without the Node http adapter. */
  adapter?: AxiosAdapter;
}

export function toHeaderLines(res: AxiosResponse): string[] {
  const lines = [`HTTP/1.1 ${res.status} ${res.statusText ?? ""}`.trimEnd()];
  for (const [name, value] of Object.entries(res.headers ?? {})) {
    if (value === undefined || value === null) continue;
    lines.push(`${name}: ${Array.isArray(value) ? value.join(", ") : String(value)}`);
  }
  return lines;
}

export class AxiosTransport implements Transport {
  private readonly instance: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.instance = axios.create({
      timeout: options.timeoutMs ?? 0,
      // Bodies stay raw: gzip handling and status classification happen in the HttpClient.
      responseType: "arraybuffer",
      decompress: false,
      validateStatus: () => true,
      transitional: { clarifyTimeoutError: true },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const res = await this.instance.request<ArrayBuffer>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
      });
      return {
        headerLines: toHeaderLines(res),
        body: res.data ? Buffer.from(res.data) : Buffer.alloc(0),
      };
    } catch (err: unknown) {
      if (axios.isAxiosError(err)) return normalizeAxiosError(err, `${request.method} ${new URL(request.url).pathname}`);
      throw err;
    }
  }
}
