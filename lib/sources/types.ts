import type { CategoryDef, RegionDef } from '@/config/regions'

/** What a provider hands back before normalization */
export type RawArticle = {
  title?: string | null
  content?: string | null
  description?: string | null
  link?: string | null
  imageUrl?: string | null
}

export interface ContentProvider {
  readonly name: string
  /** Simulated providers produce placeholder content, never trusted */
  readonly simulated: boolean
  /** False when a required credential is missing */
  isConfigured(): boolean
  fetch(
    region: RegionDef,
    category: CategoryDef,
    count: number
  ): Promise<RawArticle[]>
}
