import { z } from 'zod';
import {
  NotFoundExternalError,
  PermanentExternalError,
  TransientExternalError,
  errorMessage,
} from './errors';

export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
}

function withQuery(url: string, query?: JsonRequestOptions['query']): string {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Maps a failed response onto the external error taxonomy. */
export function errorForStatus(status: number, description: string, body?: string): Error {
  const message = body ? `${description}: ${body.slice(0, 200)}` : description;
  if (status === 404 || status === 410) return new NotFoundExternalError(message);
  if (isTransientStatus(status)) return new TransientExternalError(message);
  return new PermanentExternalError(message);
}

/**
 * One HTTP exchange. Network failures become TransientExternalError; an empty
 * body resolves to undefined.
 */
export async function request(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch
): Promise<unknown> {
  const finalUrl = withQuery(url, opts.query);
  const method = opts.method ?? 'GET';

  let res: Response;
  try {
    res = await fetcher(finalUrl, {
      method,
      headers: {
        accept: 'application/json',
        ...(opts.body ? { 'content-type': 'application/json' } : {}),
        ...(opts.headers ?? {}),
      },
      body: opts.body ? JSON.stringify(opts.body) : undefined,
    });
  } catch (e) {
    throw new TransientExternalError(`${method} ${finalUrl} failed: ${errorMessage(e)}`, { cause: e });
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => undefined);
    throw errorForStatus(res.status, `HTTP ${res.status} for ${method} ${finalUrl}`, txt);
  }

  if (res.status === 204) return undefined;
  const text = await res.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new PermanentExternalError(`Invalid JSON from ${method} ${finalUrl}`, { cause: e });
  }
}

/** `request`, with the body checked against `schema`. */
export async function requestJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch
): Promise<T> {
  const body = await request(url, opts, fetcher);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new PermanentExternalError(
      `Unexpected response from ${opts.method ?? 'GET'} ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`
    );
  }
  return parsed.data;
}
