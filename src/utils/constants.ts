import type { RunStatus } from "../types";

export const DEFAULT_API_URL = "https://parsehub.com/api/v2";

/** Largest page size the projects listing accepts; not enforced client-side. */
export const MAX_PROJECT_LIST_LIMIT = 20;

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded; charset=utf-8";

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ["complete", "error", "cancelled"];
