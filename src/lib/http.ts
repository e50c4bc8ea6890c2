import { ProviderApiError } from './errors.js';

export type HttpRequest = {
  /** Shown in error messages, e.g. "Anthropic". */
  label: string;
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | FormData;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
};

export type RetrySettings = Pick<HttpRequest, 'timeoutMs' | 'maxRetries' | 'retryBaseDelayMs'>;

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function parseRetryAfterMs(h: string | null): number | undefined {
  if (!h) return undefined;
  const s = Number(h);
  if (Number.isFinite(s) && s > 0) return Math.round(s * 1000);
  return undefined;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

function backoffMs(baseMs: number, attempt: number): number {
  return Math.round(baseMs * Math.pow(2, attempt) * (0.9 + Math.random() * 0.2));
}

export async function fetchText(req: HttpRequest): Promise<string> {
  const { label, timeoutMs = 120_000, maxRetries = 3, retryBaseDelayMs = 1000 } = req;
  let lastErr: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);

    try {
      const resp = await fetch(req.url, {
        method: req.method ?? 'GET',
        headers: req.headers,
        body: req.body,
        signal: ac.signal,
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => '');
        const err = new ProviderApiError(
          `${label} API error: ${resp.status} ${resp.statusText}${text ? `\n${text}` : ''}`,
          resp.status
        );

        if (attempt < maxRetries && isRetryableStatus(resp.status)) {
          await sleep(parseRetryAfterMs(resp.headers.get('retry-after')) ?? backoffMs(retryBaseDelayMs, attempt));
          continue;
        }

        throw err;
      }

      return await resp.text();
    } catch (e) {
      if (e instanceof ProviderApiError) throw e;
      lastErr = e;
      if (attempt < maxRetries) {
        // Network failures and timeouts are retried like 5xx.
        await sleep(backoffMs(retryBaseDelayMs, attempt));
        continue;
      }
      const isAbort = e instanceof Error && e.name === 'AbortError';
      throw isAbort ? new ProviderApiError(`${label} request timed out after ${timeoutMs}ms`) : e;
    } finally {
      clearTimeout(t);
    }
  }

  throw lastErr ?? new ProviderApiError(`${label} request failed`);
}

export async function fetchJson(req: HttpRequest): Promise<unknown> {
  const text = await fetchText(req);
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderApiError(`${req.label} returned a non-JSON response: ${text.slice(0, 200)}`);
  }
}
