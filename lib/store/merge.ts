// lib/store/merge.ts - Combine a fresh batch with the retained bucket
import {
  isTrusted,
  toStoredArticle,
  type ProcessedArticle,
  type StoredArticle,
  type Store,
} from '@/lib/models/article'
import { canonicalUrl } from '@/lib/text'

/**
 * Keeps the first occurrence of each canonical link in place. A trusted
 * duplicate further back replaces an untrusted one, so dedup never costs
 * trusted content.
 */
export function dedupeByLink(articles: StoredArticle[]): StoredArticle[] {
  const out: StoredArticle[] = []
  const indexByLink = new Map<string, number>()
  for (const article of articles) {
    const key = canonicalUrl(article.link)
    const seen = indexByLink.get(key)
    if (seen === undefined) {
      indexByLink.set(key, out.length)
      out.push(article)
    } else if (out[seen].isSimulated && !article.isSimulated) {
      out[seen] = article
    }
  }
  return out
}

/**
 * - batch has a trusted article: drop simulated leftovers, prepend the batch
 * - otherwise: prepend the batch to the whole existing bucket
 * then dedupe by link and keep the newest `max` entries.
 */
export function mergeBucket(
  existing: StoredArticle[] | undefined,
  batch: ProcessedArticle[],
  max: number
): StoredArticle[] {
  const prior = existing ?? []
  const trustworthyBatch = batch.some((a) => isTrusted(a.trust))
  const retained = trustworthyBatch ? prior.filter((a) => !a.isSimulated) : prior
  const combined = [...batch.map(toStoredArticle), ...retained]
  return dedupeByLink(combined).slice(0, max)
}

/**
 * Returns a new Store with only `regionKey/categoryKey` replaced. Every other
 * region and bucket is carried over by reference.
 */
export function withBucket(
  store: Store,
  regionKey: string,
  categoryKey: string,
  bucket: StoredArticle[]
): Store {
  return {
    ...store,
    regions: {
      ...store.regions,
      [regionKey]: {
        ...(store.regions[regionKey] ?? {}),
        [categoryKey]: bucket,
      },
    },
  }
}
