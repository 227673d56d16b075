import { RemoteCallError } from "../../ports/RemoteCallError";
import { retry } from "../../shared/retry/retry";

export type RetryPolicy = {
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitterRatio?: number;
};

export const defaultRetryPolicy: RetryPolicy = {
  retries: 5,
  minDelayMs: 250,
  maxDelayMs: 5000
};

export const noRetry: RetryPolicy = { retries: 0, minDelayMs: 0, maxDelayMs: 0 };

export type TextRequest = {
  url: URL;
  method?: "GET" | "POST";
  body?: string;
  headers?: Record<string, string>;
  accept?: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
};

export const joinPath = (baseUrl: string, ...segments: string[]): URL => {
  const url = new URL(baseUrl);
  const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
  url.pathname = [base, ...segments.map((segment) => encodeURIComponent(segment))].join("/");
  return url;
};

export const shouldRetryRemoteCall = (err: unknown) => {
  if (!(err instanceof RemoteCallError)) return false;
  if (err.isTimeout) return true;

  const status = err.status;
  if (status === 429) {
    return { retry: true, delayMs: err.retryDelayMs };
  }
  if (typeof status === "number" && status >= 400 && status < 500) return false;
  if (typeof status === "number" && status >= 500) return true;
  if (typeof status === "number") return false;
  return true;
};

const parseRetryAfterMs = (res: Response): number | undefined => {
  const retryAfter = res.headers.get("retry-after");
  return retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined;
};

export type TextPage = {
  text: string;
  nextUrl?: URL;   // from `Link: <...>; rel="next"`
};

const parseNextLink = (res: Response, requestUrl: URL): URL | undefined => {
  const link = res.headers.get("link");
  const match = link?.match(/<([^>]+)>\s*;\s*rel="?next"?/);
  return match ? new URL(match[1], requestUrl) : undefined;
};

/**
 * One HTTP exchange returning the body as text plus the next-page link, with a
 * per-attempt timeout and the given retry policy. Failures are RemoteCallError; response
 * bodies of failed calls are drained and dropped, never logged.
 */
export const requestTextPage = async (req: TextRequest): Promise<TextPage> => {
  const { url, method = "GET", body, timeoutMs, retryPolicy } = req;
  const safeRequestUrl = `${url.origin}${url.pathname}${url.search}`;
  const headers: Record<string, string> = { accept: req.accept ?? "text/plain", ...req.headers };

  const attempt = async (): Promise<TextPage> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    let res: Response;
    try {
      res = await fetch(url.toString(), { method, body, headers, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new RemoteCallError({
          message: `${method} ${safeRequestUrl} timed out after ${timeoutMs}ms`,
          isTimeout: true,
          requestUrl: safeRequestUrl
        });
      }
      throw new RemoteCallError({
        message: `${method} ${safeRequestUrl} failed: ${err instanceof Error ? err.message : String(err)}`,
        requestUrl: safeRequestUrl,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      throw new RemoteCallError({
        message: `${method} ${safeRequestUrl} failed: ${res.status}`,
        status: res.status,
        retryDelayMs: res.status === 429 ? parseRetryAfterMs(res) : undefined,
        requestUrl: safeRequestUrl
      });
    }

    return { text: await res.text(), nextUrl: parseNextLink(res, url) };
  };

  const logAttempt = (event: "http.retry" | "http.give_up", error: unknown, attemptNo: number, maxAttempts: number) => {
    const remote = error instanceof RemoteCallError ? error : undefined;
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event,
      method,
      status: remote?.status ?? null,
      timeout: remote?.isTimeout ?? false,
      url: remote?.requestUrl ?? safeRequestUrl,
      attempt: attemptNo,
      maxAttempts
    }));
  };

  return retry(attempt, {
    ...retryPolicy,
    shouldRetry: shouldRetryRemoteCall,
    onRetry: ({ attempt: attemptNo, maxAttempts, error }) => logAttempt("http.retry", error, attemptNo, maxAttempts),
    onGiveUp: ({ attempt: attemptNo, maxAttempts, error }) => logAttempt("http.give_up", error, attemptNo, maxAttempts)
  });
};

export const requestText = async (req: TextRequest): Promise<string> => (await requestTextPage(req)).text;
