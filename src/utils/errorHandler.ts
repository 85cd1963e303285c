import { type AxiosError } from "axios";
import {
  BadRequestError,
  ForbiddenError,
  RequestFailedError,
  UnauthorizedError,
} from "./errors";

export function throwForBadResponse(status: number | undefined, body: string | undefined, action: string): never {
  const msg = `Request failed${status ? ` (${status})` : ""} while trying to ${action}`;
  switch (status) {
    case 400:
      throw new BadRequestError(msg, body);
    case 401:
      throw new UnauthorizedError(msg, body);
    case 403:
      throw new ForbiddenError(msg, body);
    default:
      throw new RequestFailedError(msg, status, undefined, body);
  }
}

export function normalizeAxiosError(err: AxiosError, action: string): never {
  const message = `${err.message || "Request failed"} while trying to ${action}`;
  throw new RequestFailedError(message, err.response?.status, err.code, err);
}
