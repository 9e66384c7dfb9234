// lib/sources/http.ts - Shared JSON fetch for the headline APIs

export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>

export const USER_AGENT =
  'RegionalNewsBot/0.1 (+https://github.com/regional-news-refresh)'

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly url: string
  ) {
    super(`HTTP ${status}: ${statusText}`)
    this.name = 'HttpStatusError'
  }
}

export async function fetchJson(
  url: string,
  opts: { fetchImpl?: FetchLike; timeoutMs: number; headers?: Record<string, string> }
): Promise<unknown> {
  const doFetch = opts.fetchImpl ?? fetch
  const response = await doFetch(url, {
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
      ...opts.headers,
    },
    signal: AbortSignal.timeout(opts.timeoutMs),
  })
  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, url)
  }
  return response.json()
}

/** Query strings carry API keys; keep them out of logs */
export function redactUrl(url: string): string {
  try {
    const u = new URL(url)
    for (const key of ['apiKey', 'apikey', 'token']) {
      if (u.searchParams.has(key)) u.searchParams.set(key, '***')
    }
    return u.toString()
  } catch {
    return url
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// Auth and quota failures apply to every sub-query of the provider
const GIVE_UP_STATUSES = new Set([401, 403, 429])

/**
 * Try each sub-query (usually one per country) in order and return the first
 * result holding at least one usable record. A failing sub-query is logged
 * and counts as empty, except that an auth or quota status ends the loop.
 */
export async function firstNonEmpty<Q, R>(
  provider: string,
  queries: Q[],
  describe: (q: Q) => string,
  run: (q: Q) => Promise<R[]>,
  isUsable: (r: R) => boolean
): Promise<R[]> {
  for (const q of queries) {
    try {
      const results = await run(q)
      if (results.some(isUsable)) return results
      if (results.length > 0) {
        console.log(`  ∅ ${provider} ${describe(q)}: no usable records`)
      }
    } catch (error) {
      if (error instanceof HttpStatusError && GIVE_UP_STATUSES.has(error.status)) {
        console.warn(
          `⚠️  ${provider} ${describe(q)} got HTTP ${error.status} from ${redactUrl(error.url)}; skipping remaining queries`
        )
        return []
      }
      console.warn(`⚠️  ${provider} ${describe(q)} failed: ${errorMessage(error)}`)
    }
  }
  return []
}
