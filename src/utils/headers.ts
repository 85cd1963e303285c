/**
 * Header name to value, plus the status line under its positional key and
 * the parsed status code under `response_code`.
 */
export interface HeaderMap {
  response_code?: number;
  [name: string]: string | number | undefined;
}

const STATUS_LINE = /^HTTP\/[\d.]+\s+(\d{3})/;

/**
 * Parse raw response header lines, status line included, into a map.
 *
 * Status lines are stored under their index and also set `response_code`.
 * Other lines with a colon map trimmed name to trimmed value; the rest are
 * stored under their index. When several status lines are present (redirects), the
 * last one wins.
 */
export function parseHeaders(lines: readonly string[]): HeaderMap {
  const headers: HeaderMap = {};
  lines.forEach((line, index) => {
    // A reason phrase may itself contain a colon, so status lines are matched first.
    const match = STATUS_LINE.exec(line);
    if (match) {
      headers[String(index)] = line;
      headers.response_code = parseInt(match[1], 10);
      return;
    }
    const colon = line.indexOf(":");
    if (colon !== -1) {
      headers[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
      return;
    }
    headers[String(index)] = line;
  });
  return headers;
}

/** Case-insensitive header lookup. */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === "string") return value;
  }
  return undefined;
}

export function isGzipEncoded(headers: HeaderMap): boolean {
  return getHeader(headers, "Content-Encoding")?.toLowerCase().includes("gzip") ?? false;
}
