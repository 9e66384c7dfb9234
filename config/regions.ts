export type RegionDef = {
  key: string
  name: string
  // ISO 3166-1 alpha-2 codes queried in order; empty means one country-less query
  countries: string[]
}

export type CategoryDef = {
  key: string
  label: string
  newsApiCategory?: string
  gnewsCategory?: string
  // Used when the upstream has no matching category, and for RSS search
  keywords: string
}

export const REGIONS: RegionDef[] = [
  { key: 'global', name: 'the entire world', countries: [] },
  { key: 'north_america', name: 'North America', countries: ['us', 'ca', 'mx'] },
  { key: 'europe', name: 'Europe', countries: ['gb', 'de', 'fr', 'it'] },
  { key: 'asia', name: 'Asia', countries: ['in', 'jp', 'cn', 'sg'] },
  { key: 'africa', name: 'Africa', countries: ['za', 'ng', 'ke', 'eg'] },
  { key: 'oceania', name: 'Oceania', countries: ['au', 'nz'] },
  { key: 'south_america', name: 'South America', countries: ['br', 'ar', 'co'] },
  { key: 'middle_east', name: 'the Middle East', countries: ['ae', 'sa', 'il'] },
  { key: 'southeast_asia', name: 'Southeast Asia', countries: ['sg', 'ph', 'my', 'id'] },
  { key: 'north_africa', name: 'North Africa', countries: ['eg', 'ma'] },
  { key: 'sub_saharan_africa', name: 'Sub-Saharan Africa', countries: ['ng', 'za', 'ke'] },
  { key: 'east_asia', name: 'East Asia', countries: ['jp', 'kr', 'tw', 'hk'] },
  { key: 'south_asia', name: 'South Asia', countries: ['in', 'pk'] },
  { key: 'australia_nz', name: 'Australia and New Zealand', countries: ['au', 'nz'] },
]

export const CATEGORIES: CategoryDef[] = [
  {
    key: 'news',
    label: 'News',
    newsApiCategory: 'general',
    gnewsCategory: 'general',
    keywords: 'top news',
  },
  {
    key: 'technology',
    label: 'Technology',
    newsApiCategory: 'technology',
    gnewsCategory: 'technology',
    keywords: 'technology',
  },
  {
    key: 'finance',
    label: 'Finance',
    newsApiCategory: 'business',
    gnewsCategory: 'business',
    keywords: 'finance markets economy',
  },
  { key: 'travel', label: 'Travel', keywords: 'travel tourism' },
  {
    key: 'world',
    label: 'World',
    newsApiCategory: 'general',
    gnewsCategory: 'world',
    keywords: 'world news',
  },
  { key: 'weather', label: 'Weather', keywords: 'weather forecast' },
  { key: 'blogs', label: 'Blogs', keywords: 'blog opinion' },
]
