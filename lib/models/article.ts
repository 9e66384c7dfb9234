// lib/models/article.ts

export type UntrustedReason = 'fallback_source' | 'enrichment_failed'

export type Trust =
  | { kind: 'trusted' }
  | { kind: 'untrusted'; reason: UntrustedReason }

/** Persisted shape, shared with the front end */
export type StoredArticle = {
  title: string
  content: string
  link: string
  imageUrl: string
  isSimulated: boolean
}

/** Output of the Normalizer */
export type NormalizedArticle = {
  title: string
  content: string
  link: string
  imageUrl: string | null
}

/** A normalized article after the summarizer has run */
export type ProcessedArticle = {
  title: string
  content: string
  link: string
  imageUrl: string
  trust: Trust
}

export type CategoryBuckets = Record<string, StoredArticle[]>

export type Store = {
  regions: Record<string, CategoryBuckets>
  lastUpdatedUtc: string | null
}

export const TRUSTED: Trust = { kind: 'trusted' }

export function untrusted(reason: UntrustedReason): Trust {
  return { kind: 'untrusted', reason }
}

export function isTrusted(trust: Trust): boolean {
  return trust.kind === 'trusted'
}

export function toStoredArticle(article: ProcessedArticle): StoredArticle {
  return {
    title: article.title,
    content: article.content,
    link: article.link,
    imageUrl: article.imageUrl,
    isSimulated: !isTrusted(article.trust),
  }
}

export function emptyStore(): Store {
  return { regions: {}, lastUpdatedUtc: null }
}
