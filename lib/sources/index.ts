import type { RefreshConfig } from '@/lib/config'
import { FixedIntervalPacer } from '@/lib/pacer'
import { SourceChain } from './chain'
import { GNewsProvider } from './gnews'
import { GoogleNewsRssProvider } from './googleNewsRss'
import { NewsApiProvider } from './newsApi'
import { SimulatedProvider } from './simulated'

/** Priority order: keyed APIs, the keyless feed, then the simulated generator */
export function createSourceChain(config: RefreshConfig): SourceChain {
  return new SourceChain([
    new NewsApiProvider({
      apiKey: config.newsApiKey,
      pacer: new FixedIntervalPacer(config.sourcePauseMs),
      timeoutMs: config.requestTimeoutMs,
    }),
    new GNewsProvider({
      apiKey: config.gnewsApiKey,
      pacer: new FixedIntervalPacer(config.sourcePauseMs),
      timeoutMs: config.requestTimeoutMs,
    }),
    new GoogleNewsRssProvider({
      enabled: config.googleNewsRssEnabled,
      pacer: new FixedIntervalPacer(config.sourcePauseMs),
      timeoutMs: config.requestTimeoutMs,
      maxAgeHours: config.googleNewsMaxAgeHours,
    }),
    new SimulatedProvider(config.simulatedFallback),
  ])
}

export { SourceChain, type SourceResult } from './chain'
export type { ContentProvider, RawArticle } from './types'
