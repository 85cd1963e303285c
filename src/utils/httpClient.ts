import { gunzipSync } from "node:zlib";
import type { Decoded, Envelope, RequestDescriptor, RequestParams } from "../types";
import { FORM_CONTENT_TYPE } from "./constants";
import { throwForBadResponse } from "./errorHandler";
import { RequestFailedError } from "./errors";
import { isGzipEncoded, parseHeaders } from "./headers";
import type { Logger } from "./logger";
import type { Transport, TransportRequest, TransportResponse } from "./transport";

export interface HttpClientOptions {
  apiUrl: string;
  transport: Transport;
  logger: Logger;
}

/**
 * Serialize params as `application/x-www-form-urlencoded`. Undefined values
 * are skipped and booleans become `1` or `0`.
 */
export function encodeParams(params: RequestParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, typeof value === "boolean" ? (value ? "1" : "0") : String(value));
  }
  return search.toString();
}

/** Parse a body as JSON; anything that is not an object or array decodes to `{}`. */
export function decodeBody<T>(text: string): Decoded<T> {
  let parsed: T | null;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  if (typeof parsed !== "object" || parsed === null) return {};
  return parsed;
}

export class HttpClient {
  private readonly apiUrl: string;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/$/, "");
    this.transport = options.transport;
    this.logger = options.logger.child({ module: "httpClient" });
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  buildRequest(descriptor: RequestDescriptor): TransportRequest {
    const encoded = encodeParams(descriptor.params);
    const url = `${this.apiUrl}${descriptor.path}`;
    if (descriptor.method === "POST") {
      return {
        method: descriptor.method,
        url,
        headers: { "Content-Type": FORM_CONTENT_TYPE, "Accept-Encoding": "gzip" },
        body: encoded,
      };
    }
    return {
      method: descriptor.method,
      url: encoded ? `${url}?${encoded}` : url,
      headers: { "Accept-Encoding": "gzip" },
    };
  }

  /**
   * Perform the request described by `descriptor` and normalize the response:
   * classify unsuccessful statuses, gunzip, then return `{ raw }` or the
   * decoded JSON body.
   */
  async execute<T>(descriptor: RequestDescriptor, decodeJSON: boolean): Promise<Envelope<T>> {
    const logger = this.logger.child({ method: "execute" });
    const request = this.buildRequest(descriptor);
    logger.debug("Sending request", { httpMethod: descriptor.method, path: descriptor.path });

    let response: TransportResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      logger.warn("Transport request failed", { action: descriptor.action, error });
      throw error;
    }
    const headers = parseHeaders(response.headerLines);
    const gzipped = isGzipEncoded(headers);
    const status = headers.response_code;

    if (status === undefined || status < 200 || status > 299) {
      logger.warn("Request was not successful", { action: descriptor.action, status });
      throwForBadResponse(status, gzipped ? undefined : response.body.toString("utf8"), descriptor.action);
    }

    let body = response.body;
    if (gzipped) {
      try {
        body = gunzipSync(body);
      } catch (error) {
        throw new RequestFailedError(`Failed to decompress response while trying to ${descriptor.action}`, status, "decompress_failed", error);
      }
    }

    const text = body.toString("utf8");
    if (decodeJSON) {
      return decodeBody<T>(text);
    }
    return { raw: text };
  }
}
