// lib/sources/googleNewsRss.ts - Google News search feed, no credential needed
import Parser from 'rss-parser'
import dayjs from 'dayjs'
import type { CategoryDef, RegionDef } from '@/config/regions'
import type { Pacer } from '@/lib/pacer'
import { USER_AGENT } from './http'
import type { ContentProvider, RawArticle } from './types'

type RssItem = {
  title?: string
  link?: string
  isoDate?: string
  pubDate?: string
  contentSnippet?: string
  content?: string
}

export type FeedLoader = (url: string) => Promise<{ items: RssItem[] }>

/** Unwrap Google News redirect to publisher URL when present */
export function unGoogleLink(link: string) {
  try {
    const u = new URL(link)
    if (u.hostname.includes('news.google.com')) {
      const direct = u.searchParams.get('url')
      if (direct) return direct
    }
    return link
  } catch {
    return link
  }
}

/** "Headline - Publisher" → "Headline" */
export function cleanGoogleNewsTitle(title: string) {
  return title.replace(/\s[-—]\s[^-—]+$/, '').trim()
}

export function buildGoogleNewsUrl(region: RegionDef, category: CategoryDef) {
  const q =
    region.countries.length > 0
      ? `${category.keywords} ${region.name}`
      : category.keywords
  const gl = (region.countries[0] || 'us').toUpperCase()
  const params = new URLSearchParams({
    q,
    hl: 'en-US',
    gl,
    ceid: `${gl}:en`,
  })
  return `https://news.google.com/rss/search?${params.toString()}`
}

function parseDateMaybe(s?: string) {
  if (!s) return null
  const d = dayjs(s)
  return d.isValid() ? d : null
}

export function rssItemsToRaw(
  items: RssItem[],
  now: Date,
  maxAgeHours: number
): RawArticle[] {
  const out: RawArticle[] = []
  for (const it of items) {
    const published = parseDateMaybe(it.isoDate || it.pubDate)
    if (published && dayjs(now).diff(published, 'hour') > maxAgeHours) continue

    const rawTitle = (it.title || '').trim()
    const title = cleanGoogleNewsTitle(rawTitle)
    const snippet = (it.contentSnippet || it.content || '').trim()
    out.push({
      title,
      // Google snippets often just repeat the headline and publisher
      content: snippet && snippet !== rawTitle ? snippet : title,
      link: it.link ? unGoogleLink(it.link.trim()) : null,
      imageUrl: null,
    })
  }
  return out
}

type GoogleNewsOptions = {
  enabled: boolean
  pacer: Pacer
  timeoutMs: number
  maxAgeHours: number
  loadFeed?: FeedLoader
  now?: () => Date
}

export class GoogleNewsRssProvider implements ContentProvider {
  readonly name = 'google-news-rss'
  readonly simulated = false
  private readonly loadFeed: FeedLoader

  constructor(private readonly opts: GoogleNewsOptions) {
    if (opts.loadFeed) {
      this.loadFeed = opts.loadFeed
    } else {
      const parser = new Parser({
        headers: { 'User-Agent': USER_AGENT },
        timeout: opts.timeoutMs,
      })
      this.loadFeed = (url) => parser.parseURL(url)
    }
  }

  isConfigured(): boolean {
    return this.opts.enabled
  }

  async fetch(
    region: RegionDef,
    category: CategoryDef,
    count: number
  ): Promise<RawArticle[]> {
    const url = buildGoogleNewsUrl(region, category)
    await this.opts.pacer.acquire()
    console.log(`📰 Google News RSS ${url}`)
    const feed = await this.loadFeed(url)
    const now = this.opts.now ? this.opts.now() : new Date()
    return rssItemsToRaw(feed.items || [], now, this.opts.maxAgeHours).slice(
      0,
      count
    )
  }
}
