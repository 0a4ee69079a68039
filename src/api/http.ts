/**
 * Thin fetch wrapper shared by the data providers.
 * Every request is bounded by a timeout; callers decide what a failure means.
 */

export interface HttpOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export class HttpError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`HTTP ${status} from ${redactUrl(url)}`);
    this.name = "HttpError";
    this.status = status;
  }
}

/** Hide API keys before a URL reaches a log line */
export function redactUrl(url: string): string {
  return url.replace(/(api_?key=)[^&]+/gi, "$1***");
}

async function request(url: string, options: HttpOptions): Promise<Response> {
  const res = await fetch(url, {
    headers: { "User-Agent": "Mozilla/5.0", ...options.headers },
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!res.ok) {
    throw new HttpError(url, res.status);
  }
  return res;
}

export async function fetchJson(url: string, options: HttpOptions): Promise<unknown> {
  const res = await request(url, options);
  return (await res.json()) as unknown;
}

export async function fetchText(url: string, options: HttpOptions): Promise<string> {
  const res = await request(url, options);
  return res.text();
}
