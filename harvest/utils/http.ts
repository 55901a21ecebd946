import fetch from "node-fetch";

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

export type HttpOptions = {
  rateMs: number;      // politeness pause after each successful request
  timeoutMs: number;
  retries: number;
  backoffMs: number;   // waits backoffMs * n before the nth retry, unless Retry-After says otherwise
};

export const DEFAULT_HTTP: HttpOptions = { rateMs: 100, timeoutMs: 30_000, retries: 3, backoffMs: 500 };

export type HttpErrorKind = "network" | "http" | "rate_limit" | "response";

export class HttpError extends Error {
  constructor(
    message: string,
    readonly kind: HttpErrorKind,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function withQuery(url: string, q?: Record<string, string | string[]>) {
  if (!q) return url;
  const qs = new URLSearchParams(
    Object.entries(q).flatMap<[string, string]>(([k, v]) => Array.isArray(v) ? v.map<[string, string]>(x => [k, x]) : [[k, v]])
  ).toString();
  return qs ? `${url}?${qs}` : url;
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

function retryable(status: number) {
  return status === 429 || status >= 500;
}

export async function getJson(
  url: string,
  q?: Record<string, string | string[]>,
  opts: Partial<HttpOptions> = {},
): Promise<unknown> {
  const { rateMs, timeoutMs, retries, backoffMs } = { ...DEFAULT_HTTP, ...opts };
  const target = withQuery(url, q);
  let last: HttpError | undefined;
  let retryAfterMs = 0;

  for (let i = 0; i <= retries; i++) {
    if (i > 0) await delay(retryAfterMs > 0 ? retryAfterMs : backoffMs * i);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    let status = 0;
    let text = "";
    try {
      const res = await fetch(target, { headers: { "Accept": "application/json" }, signal: controller.signal });
      status = res.status;
      retryAfterMs = (Number(res.headers.get("retry-after")) || 0) * 1000;
      text = await res.text();
    } catch (e) {
      retryAfterMs = 0;
      const timedOut = e instanceof Error && e.name === "AbortError";
      last = new HttpError(
        timedOut ? `GET ${target} -> timed out after ${timeoutMs}ms` : `GET ${target} -> ${errorMessage(e)}`,
        "network",
      );
      continue;
    } finally {
      clearTimeout(timer);
    }

    if (status >= 200 && status < 300) {
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (e) {
        throw new HttpError(`GET ${target} -> invalid JSON: ${errorMessage(e)}`, "response", status);
      }
      await delay(rateMs);
      return data;
    }

    last = new HttpError(`GET ${target} -> ${status}`, status === 429 ? "rate_limit" : "http", status);
    if (!retryable(status)) throw last;
  }

  throw last ?? new HttpError(`GET ${target} failed`, "network");
}
