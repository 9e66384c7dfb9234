// lib/sources/simulated.ts - Placeholder content when every real upstream is dry
import type { CategoryDef, RegionDef } from '@/config/regions'
import { placeholderImageUrl } from '@/lib/text'
import type { ContentProvider, RawArticle } from './types'

export function simulatedArticles(
  region: RegionDef,
  category: CategoryDef,
  count: number
): RawArticle[] {
  const articles: RawArticle[] = []
  for (let i = 1; i <= count; i++) {
    const link = `https://example.com/${region.key}/${category.key}/${i}`
    articles.push({
      title: `${category.label} Update ${i} for ${region.name}`,
      content: `This is a simulated summary of ${category.label.toLowerCase()} related to ${region.name}, article number ${i}. It highlights key developments and insights.`,
      link,
      imageUrl: placeholderImageUrl(category.label, link),
    })
  }
  return articles
}

export class SimulatedProvider implements ContentProvider {
  readonly name = 'simulated'
  readonly simulated = true

  constructor(private readonly enabled: boolean) {}

  isConfigured(): boolean {
    return this.enabled
  }

  async fetch(
    region: RegionDef,
    category: CategoryDef,
    count: number
  ): Promise<RawArticle[]> {
    return simulatedArticles(region, category, count)
  }
}
