// lib/config.ts - Immutable run configuration built from the environment
import {
  CATEGORIES,
  REGIONS,
  type CategoryDef,
  type RegionDef,
} from '@/config/regions'

type Env = Record<string, string | undefined>

export type RefreshConfig = Readonly<{
  regions: ReadonlyArray<RegionDef>
  categories: ReadonlyArray<CategoryDef>
  runsPerDay: number
  articlesPerCategory: number
  maxArticlesPerCategory: number
  sourcePauseMs: number
  summaryPauseMs: number
  requestTimeoutMs: number
  summaryTimeoutMs: number
  googleNewsMaxAgeHours: number
  googleNewsRssEnabled: boolean
  simulatedFallback: boolean
  updatesPath: string
  summaryModel: string
  newsApiKey: string | null
  gnewsApiKey: string | null
  openaiApiKey: string | null
}>

export function parseEnvInt(
  env: Env,
  name: string,
  defaultValue: number
): number {
  const raw = env[name]
  if (!raw) return defaultValue
  const parsed = Number.parseInt(raw, 10)
  return Number.isFinite(parsed) ? parsed : defaultValue
}

function secret(env: Env, name: string): string | null {
  const value = (env[name] || '').trim()
  return value ? value : null
}

function clamp(name: string, value: number, min: number, max: number) {
  if (value < min || value > max) {
    const clamped = Math.min(max, Math.max(min, value))
    console.warn(`⚠️  ${name}=${value} out of range ${min}-${max}; using ${clamped}`)
    return clamped
  }
  return value
}

export function loadConfig(
  env: Env = process.env,
  overrides: Partial<RefreshConfig> = {}
): RefreshConfig {
  const config: RefreshConfig = {
    regions: REGIONS,
    categories: CATEGORIES,
    runsPerDay: clamp(
      'REFRESH_RUNS_PER_DAY',
      parseEnvInt(env, 'REFRESH_RUNS_PER_DAY', 8),
      1,
      24
    ),
    articlesPerCategory: clamp(
      'ARTICLES_PER_CATEGORY',
      parseEnvInt(env, 'ARTICLES_PER_CATEGORY', 5),
      1,
      100
    ),
    maxArticlesPerCategory: clamp(
      'MAX_ARTICLES_PER_CATEGORY',
      parseEnvInt(env, 'MAX_ARTICLES_PER_CATEGORY', 30),
      1,
      1000
    ),
    sourcePauseMs: Math.max(0, parseEnvInt(env, 'SOURCE_PAUSE_MS', 1500)),
    summaryPauseMs: Math.max(0, parseEnvInt(env, 'SUMMARY_PAUSE_MS', 4000)),
    requestTimeoutMs: Math.max(1000, parseEnvInt(env, 'REQUEST_TIMEOUT_MS', 15000)),
    summaryTimeoutMs: Math.max(1000, parseEnvInt(env, 'SUMMARY_TIMEOUT_MS', 20000)),
    googleNewsMaxAgeHours: Math.max(
      1,
      parseEnvInt(env, 'GOOGLE_NEWS_MAX_AGE_HOURS', 72)
    ),
    googleNewsRssEnabled: env.GOOGLE_NEWS_RSS_ENABLED !== '0',
    simulatedFallback: env.SIMULATED_FALLBACK === '1',
    updatesPath: (env.UPDATES_PATH || '').trim() || 'updates.json',
    summaryModel: (env.SUMMARY_MODEL || '').trim() || 'gpt-4o-mini',
    newsApiKey: secret(env, 'NEWSAPI_KEY'),
    gnewsApiKey: secret(env, 'GNEWS_API_KEY'),
    openaiApiKey: secret(env, 'OPENAI_API_KEY'),
    ...overrides,
  }
  return Object.freeze(config)
}
