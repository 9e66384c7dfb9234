// lib/sources/normalize.ts
import type { NormalizedArticle } from '@/lib/models/article'
import { canonicalUrl, isHttpUrl, stripHtml } from '@/lib/text'
import type { RawArticle } from './types'

function pick(...vals: Array<string | undefined | null>) {
  for (const v of vals) {
    const cleaned = stripHtml(v)
    if (cleaned) return cleaned
  }
  return ''
}

/**
 * Shape a raw provider record into the canonical article.
 * Returns null unless title, body and link are all present.
 */
export function normalizeRawArticle(raw: RawArticle): NormalizedArticle | null {
  const title = stripHtml(raw.title)
  const content = pick(raw.content, raw.description)
  const link = (raw.link || '').trim()
  if (!title || !content || !link) return null

  const image = (raw.imageUrl || '').trim()
  return {
    title,
    content,
    link: canonicalUrl(link),
    imageUrl: isHttpUrl(image) ? image : null,
  }
}

export function normalizeAll(raws: RawArticle[]): NormalizedArticle[] {
  const out: NormalizedArticle[] = []
  for (const raw of raws) {
    const article = normalizeRawArticle(raw)
    if (article) out.push(article)
  }
  return out
}
