/**
 * Base class for every error raised by the client.
 *
 * @example
 * ```ts
 * try {
 *   await client.getProject("tPROJECT");
 * } catch (error) {
 *   if (error instanceof UnauthorizedError) {
 *     // prompt for a new API key
 *   }
 * }
 * ```
 */
export class ParseHubError extends Error {
  status?: number;
  code?: string;
  details?: unknown;
  constructor(message: string, status?: number, code?: string, details?: unknown) {
    super(message);
    this.name = "ParseHubError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/** The API key was not set when a method was called. */
export class ConfigurationError extends ParseHubError {
  constructor(message: string) {
    super(message, undefined, "configuration");
    this.name = "ConfigurationError";
  }
}

/** A required project or run token was empty. */
export class InvalidArgumentError extends ParseHubError {
  constructor(message: string) {
    super(message, undefined, "invalid_argument");
    this.name = "InvalidArgumentError";
  }
}

export class BadRequestError extends ParseHubError {
  constructor(message: string, details?: unknown) {
    super(message, 400, "bad_request", details);
    this.name = "BadRequestError";
  }
}

export class UnauthorizedError extends ParseHubError {
  constructor(message: string, details?: unknown) {
    super(message, 401, "unauthorized", details);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends ParseHubError {
  constructor(message: string, details?: unknown) {
    super(message, 403, "forbidden", details);
    this.name = "ForbiddenError";
  }
}

/** Transport failures and every unsuccessful status without a dedicated class. */
export class RequestFailedError extends ParseHubError {
  constructor(message: string, status?: number, code?: string, details?: unknown) {
    super(message, status, code ?? "request_failed", details);
    this.name = "RequestFailedError";
  }
}
