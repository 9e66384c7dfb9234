// lib/sources/gnews.ts - gnews.io adapter
import { z } from 'zod'
import type { CategoryDef, RegionDef } from '@/config/regions'
import type { Pacer } from '@/lib/pacer'
import { fetchJson, firstNonEmpty, redactUrl, type FetchLike } from './http'
import { normalizeRawArticle } from './normalize'
import type { ContentProvider, RawArticle } from './types'

const BASE_URL = 'https://gnews.io/api/v4'

// Error bodies ({ errors: [...] }) have no articles and fail the parse
const GNewsResponseSchema = z.object({
  articles: z.array(
    z.object({
      title: z.string().nullish(),
      description: z.string().nullish(),
      content: z.string().nullish(),
      url: z.string().nullish(),
      image: z.string().nullish(),
    })
  ),
})

export function parseGNewsResponse(body: unknown): RawArticle[] {
  const parsed = GNewsResponseSchema.parse(body)
  return parsed.articles.map((a) => ({
    title: a.title,
    description: a.description,
    content: a.description || a.content,
    link: a.url,
    imageUrl: a.image,
  }))
}

export function buildGNewsUrl(
  apiKey: string,
  country: string | null,
  category: CategoryDef,
  count: number
): string {
  const params = new URLSearchParams({ lang: 'en', max: String(count), apikey: apiKey })
  if (country) params.set('country', country)
  if (category.gnewsCategory) {
    params.set('category', category.gnewsCategory)
    return `${BASE_URL}/top-headlines?${params.toString()}`
  }
  params.set('q', category.keywords)
  return `${BASE_URL}/search?${params.toString()}`
}

type GNewsOptions = {
  apiKey: string | null
  pacer: Pacer
  timeoutMs: number
  fetchImpl?: FetchLike
}

export class GNewsProvider implements ContentProvider {
  readonly name = 'gnews'
  readonly simulated = false

  constructor(private readonly opts: GNewsOptions) {}

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
        const url = buildGNewsUrl(apiKey, country, category, count)
        await this.opts.pacer.acquire()
        console.log(`📰 GNews ${redactUrl(url)}`)
        const body = await fetchJson(url, {
          fetchImpl: this.opts.fetchImpl,
          timeoutMs: this.opts.timeoutMs,
        })
        return parseGNewsResponse(body)
      },
      (raw) => normalizeRawArticle(raw) !== null
    )
  }
}
