import { jest } from "@jest/globals";
import * as winston from "winston";
import { ParseHubClient } from "../../client";
import type { TransportRequest, TransportResponse } from "../../utils/transport";

export const silentLogger = winston.createLogger({ silent: true });

export function fakeTransport(response: Partial<TransportResponse> = {}) {
  const send = jest.fn(
    async (_request: TransportRequest): Promise<TransportResponse> => ({
      headerLines: ["HTTP/1.1 200 OK", "Content-Type: application/json"],
      body: Buffer.from("{}"),
      ...response,
    }),
  );
  return { send };
}

export function clientWith(transport: ReturnType<typeof fakeTransport>, apiKey = "test-key"): ParseHubClient {
  return new ParseHubClient(apiKey, { transport, logger: silentLogger });
}
