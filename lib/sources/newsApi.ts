// lib/sources/newsApi.ts - newsapi.org top-headlines adapter
import { z } from 'zod'
import type { CategoryDef, RegionDef } from '@/config/regions'
import type { Pacer } from '@/lib/pacer'
import { fetchJson, firstNonEmpty, redactUrl, type FetchLike } from './http'
import { normalizeRawArticle } from './normalize'
import type { ContentProvider, RawArticle } from './types'

const BASE_URL = 'https://newsapi.org/v2/top-headlines'

const NewsApiResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        description: z.string().nullish(),
        content: z.string().nullish(),
        url: z.string().nullish(),
        urlToImage: z.string().nullish(),
      })
    )
    .default([]),
})

// NewsAPI truncates `content` with a "[+1234 chars]" marker
function trimTruncationMarker(s: string | null | undefined) {
  return s ? s.replace(/\s*\[\+\d+ chars\]\s*$/, '').trim() : s
}

export function parseNewsApiResponse(body: unknown): RawArticle[] {
  const parsed = NewsApiResponseSchema.parse(body)
  if (parsed.status !== 'ok') {
    throw new Error(`NewsAPI error: ${parsed.message ?? parsed.status}`)
  }
  return parsed.articles
    .filter((a) => a.title !== '[Removed]')
    .map((a) => ({
      title: a.title,
      description: a.description,
      content: a.description || trimTruncationMarker(a.content),
      link: a.url,
      imageUrl: a.urlToImage,
    }))
}

export function buildNewsApiUrl(
  apiKey: string,
  country: string | null,
  category: CategoryDef,
  count: number
): string {
  const params = new URLSearchParams({ pageSize: String(count), apiKey })
  if (country) params.set('country', country)
  if (category.newsApiCategory) {
    params.set('category', category.newsApiCategory)
  } else {
    params.set('q', category.keywords)
  }
  return `${BASE_URL}?${params.toString()}`
}

type NewsApiOptions = {
  apiKey: string | null
  pacer: Pacer
  timeoutMs: number
  fetchImpl?: FetchLike
}

export class NewsApiProvider implements ContentProvider {
  readonly name = 'newsapi'
  readonly simulated = false

  constructor(private readonly opts: NewsApiOptions) {}

  isConfigured(): boolean {
    return !!this.opts.apiKey
  }

  async fetch(
    region: RegionDef,
    category: CategoryDef,
    count: number
  ): Promise<RawArticle[]> {
    const apiKey = this.opts.apiKey
    if (!apiKey) return []
    const countries: Array<string | null> =
      region.countries.length > 0 ? region.countries : [null]

    return firstNonEmpty(
      this.name,
      countries,
      (country) => `${country ?? 'all'}/${category.key}`,
      async (country) => {
        const url = buildNewsApiUrl(apiKey, country, category, count)
        await this.opts.pacer.acquire()
        console.log(`📰 NewsAPI ${redactUrl(url)}`)
        const body = await fetchJson(url, {
          fetchImpl: this.opts.fetchImpl,
          timeoutMs: this.opts.timeoutMs,
        })
        return parseNewsApiResponse(body)
      },
      (raw) => normalizeRawArticle(raw) !== null
    )
  }
}
