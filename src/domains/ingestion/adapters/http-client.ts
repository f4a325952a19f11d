// ──────────────────────────────────────────
// Ingestion: minimal JSON-over-HTTP client shared by the adapters
// ──────────────────────────────────────────

import { UpstreamError, errorMessage } from '../../../shared/errors';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchFn = (
  url: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal }
) => Promise<FetchResponseLike>;

export type QueryParams = Record<string, string | number>;

const REQUEST_TIMEOUT_MS = 30_000;

export function buildUrl(base: string, path: string, params: QueryParams): string {
  const url = `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.set(key, String(value));
  }
  const qs = query.toString();
  return qs ? `${url}?${qs}` : url;
}

/** GET and decode JSON; transport failures and non-2xx become UpstreamError. */
export async function getJson(fetchFn: FetchFn, url: string, headers: Record<string, string> = {}): Promise<unknown> {
  let res: FetchResponseLike;
  try {
    res = await fetchFn(url, { headers, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
  } catch (err) {
    throw new UpstreamError(`GET ${url} failed: ${errorMessage(err)}`);
  }
  if (!res.ok) {
    throw new UpstreamError(`GET ${url} returned HTTP ${res.status}`, res.status);
  }
  try {
    return await res.json();
  } catch (err) {
    throw new UpstreamError(`GET ${url} returned invalid JSON: ${errorMessage(err)}`, res.status);
  }
}
