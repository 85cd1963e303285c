import { describe, test, expect, jest } from "@jest/globals";
import * as winston from "winston";
import { gzipSync } from "node:zlib";
import { HttpClient, decodeBody, encodeParams } from "../../utils/httpClient";
import { BadRequestError, ForbiddenError, RequestFailedError, UnauthorizedError } from "../../utils/errors";
import type { RequestDescriptor } from "../../types";
import { fakeTransport, silentLogger } from "../helpers/fakeTransport";

const getRun: RequestDescriptor = {
  method: "GET",
  path: "/runs/tRUN",
  action: "get run",
  params: { api_key: "test-key" },
};

function httpWith(transport: ReturnType<typeof fakeTransport>): HttpClient {
  return new HttpClient({ apiUrl: "https://parsehub.test/api/v2/", transport, logger: silentLogger });
}

describe("utils: httpClient", () => {
  test("encodeParams: skips undefined, encodes booleans as 1/0 and escapes values", () => {
    expect(encodeParams({ api_key: "k", a: undefined, yes: true, no: false, offset: 0, q: "a b&c" })).toBe(
      "api_key=k&yes=1&no=0&offset=0&q=a+b%26c",
    );
  });

  test("decodeBody: objects and arrays pass through, everything else is {}", () => {
    expect(decodeBody('{"a":1}')).toEqual({ a: 1 });
    expect(decodeBody("[1,2]")).toEqual([1, 2]);
    expect(decodeBody("not json")).toEqual({});
    expect(decodeBody("null")).toEqual({});
    expect(decodeBody("42")).toEqual({});
  });

  test("buildRequest: GET puts params in the query string", () => {
    const request = httpWith(fakeTransport()).buildRequest(getRun);
    expect(request).toEqual({
      method: "GET",
      url: "https://parsehub.test/api/v2/runs/tRUN?api_key=test-key",
      headers: { "Accept-Encoding": "gzip" },
    });
  });

  test("buildRequest: POST sends a form body", () => {
    const request = httpWith(fakeTransport()).buildRequest({ ...getRun, method: "POST", path: "/runs/tRUN/cancel" });
    expect(request.url).toBe("https://parsehub.test/api/v2/runs/tRUN/cancel");
    expect(request.body).toBe("api_key=test-key");
    expect(request.headers["Content-Type"]).toBe("application/x-www-form-urlencoded; charset=utf-8");
  });

  test("execute: returns the raw body without decodeJSON", async () => {
    const transport = fakeTransport({ body: Buffer.from('{"status":"running"}') });
    await expect(httpWith(transport).execute(getRun, false)).resolves.toEqual({ raw: '{"status":"running"}' });
    expect(transport.send).toHaveBeenCalledTimes(1);
  });

  test("execute: gunzips when Content-Encoding is gzip", async () => {
    const original = "token,status\nabc,complete\n";
    const transport = fakeTransport({
      headerLines: ["HTTP/1.1 200 OK", "Content-Encoding: gzip"],
      body: gzipSync(Buffer.from(original)),
    });
    await expect(httpWith(transport).execute(getRun, false)).resolves.toEqual({ raw: original });
  });

  test("execute: gunzips before decoding JSON", async () => {
    const transport = fakeTransport({
      headerLines: ["HTTP/1.1 200 OK", "content-encoding: gzip"],
      body: gzipSync(Buffer.from('{"title":"ok"}')),
    });
    await expect(httpWith(transport).execute(getRun, true)).resolves.toEqual({ title: "ok" });
  });

  test("execute: a body that is not gzip despite the header is a RequestFailedError", async () => {
    const transport = fakeTransport({
      headerLines: ["HTTP/1.1 200 OK", "Content-Encoding: gzip"],
      body: Buffer.from("plain"),
    });
    await expect(httpWith(transport).execute(getRun, false)).rejects.toThrow(RequestFailedError);
  });

  test("execute: non-JSON body with decodeJSON yields {}", async () => {
    const transport = fakeTransport({ body: Buffer.from("<html>oops</html>") });
    await expect(httpWith(transport).execute(getRun, true)).resolves.toEqual({});
  });

  test.each([
    { status: 400, name: "BadRequestError" },
    { status: 401, name: "UnauthorizedError" },
    { status: 403, name: "ForbiddenError" },
    { status: 404, name: "RequestFailedError" },
    { status: 500, name: "RequestFailedError" },
  ])("execute: status $status is classified as $name", async ({ status, name }) => {
    const transport = fakeTransport({ headerLines: [`HTTP/1.1 ${status} Nope`], body: Buffer.from("denied") });
    await expect(httpWith(transport).execute(getRun, false)).rejects.toMatchObject({ name, status, details: "denied" });
  });

  test("execute: classified errors keep their class", async () => {
    const forbidden = fakeTransport({ headerLines: ["HTTP/1.1 403 Forbidden"] });
    await expect(httpWith(forbidden).execute(getRun, false)).rejects.toThrow(ForbiddenError);
    const bad = fakeTransport({ headerLines: ["HTTP/1.1 400 Bad Request"] });
    await expect(httpWith(bad).execute(getRun, false)).rejects.toThrow(BadRequestError);
    const unauthorized = fakeTransport({ headerLines: ["HTTP/1.1 401 Unauthorized"] });
    await expect(httpWith(unauthorized).execute(getRun, false)).rejects.toThrow(UnauthorizedError);
  });

  test("execute: a response without a status line is a RequestFailedError", async () => {
    const transport = fakeTransport({ headerLines: ["Content-Type: text/plain"] });
    await expect(httpWith(transport).execute(getRun, false)).rejects.toThrow(RequestFailedError);
  });

  test("execute: error message names the action", async () => {
    const transport = fakeTransport({ headerLines: ["HTTP/1.1 401 Unauthorized"] });
    await expect(httpWith(transport).execute(getRun, false)).rejects.toThrow("Request failed (401) while trying to get run");
  });

  test("execute: transport failures are logged at warn and rethrown", async () => {
    const logger = winston.createLogger({ silent: true });
    jest.spyOn(logger, "child").mockReturnValue(logger);
    const warn = jest.spyOn(logger, "warn");
    const failure = new RequestFailedError("socket hang up while trying to GET /api/v2/runs/tRUN");
    const transport = fakeTransport();
    transport.send.mockRejectedValueOnce(failure);
    const http = new HttpClient({ apiUrl: "https://parsehub.test/api/v2", transport, logger });
    await expect(http.execute(getRun, false)).rejects.toBe(failure);
    expect(warn).toHaveBeenCalledWith("Transport request failed", { action: "get run", error: failure });
  });
});
