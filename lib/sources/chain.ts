// lib/sources/chain.ts - Ordered provider fallback
import type { CategoryDef, RegionDef } from '@/config/regions'
import type { NormalizedArticle } from '@/lib/models/article'
import { errorMessage } from './http'
import { normalizeAll } from './normalize'
import type { ContentProvider } from './types'

export type SourceResult = {
  provider: string | null
  simulated: boolean
  articles: NormalizedArticle[]
}

const EMPTY: SourceResult = { provider: null, simulated: false, articles: [] }

/**
 * Tries providers in priority order. The first provider yielding at least one
 * normalized article wins outright; results are never merged across providers.
 */
export class SourceChain {
  constructor(private readonly providers: ReadonlyArray<ContentProvider>) {}

  get providerNames(): string[] {
    return this.providers.map((p) => p.name)
  }

  async fetch(
    region: RegionDef,
    category: CategoryDef,
    count: number
  ): Promise<SourceResult> {
    const label = `${region.key}/${category.key}`

    for (const provider of this.providers) {
      if (!provider.isConfigured()) {
        console.log(`  ⏭️  ${provider.name} not configured, skipping`)
        continue
      }

      let articles: NormalizedArticle[]
      try {
        articles = normalizeAll(await provider.fetch(region, category, count))
      } catch (error) {
        console.warn(
          `⚠️  ${provider.name} failed for ${label}: ${errorMessage(error)}`
        )
        continue
      }

      if (articles.length > 0) {
        console.log(
          `  ✓ ${provider.name} returned ${articles.length} articles for ${label}`
        )
        return {
          provider: provider.name,
          simulated: provider.simulated,
          articles: articles.slice(0, count),
        }
      }
      console.log(`  ∅ ${provider.name} had nothing for ${label}`)
    }

    return EMPTY
  }
}
