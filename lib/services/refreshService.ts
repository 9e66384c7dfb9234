// lib/services/refreshService.ts
// Orchestrates one scheduled run: pick the window, fetch, summarize, merge, save.
import type { RefreshConfig } from '@/lib/config'
import {
  TRUSTED,
  untrusted,
  type ProcessedArticle,
  type Store,
  type UntrustedReason,
} from '@/lib/models/article'
import { FixedIntervalPacer } from '@/lib/pacer'
import {
  buildWorkItems,
  selectBatchWindow,
  sliceWindow,
  workItemKey,
  type BatchWindow,
  type WorkItem,
} from '@/lib/scheduler'
import { createSourceChain, type SourceChain, type SourceResult } from '@/lib/sources'
import { mergeBucket, withBucket } from '@/lib/store/merge'
import { loadStore, saveStore } from '@/lib/store/persistence'
import {
  createOpenAISummaryGenerator,
  resolveImageUrl,
  Summarizer,
} from '@/lib/summarizer'

export type RefreshDeps = {
  config: RefreshConfig
  chain: Pick<SourceChain, 'fetch'>
  summarizer: Pick<Summarizer, 'summarize'>
}

export type RefreshOptions = {
  now?: Date
  // Force a window instead of deriving it from the clock
  windowIndex?: number
  dryRun?: boolean
  updatesPath?: string
}

export type WorkItemReport = {
  key: string
  status: 'updated' | 'unchanged' | 'failed'
  provider: string | null
  trusted: number
  untrusted: Partial<Record<UntrustedReason, number>>
  bucketSize: number
  error?: string
}

export type RefreshReport = {
  window: { index: number; start: number; end: number; total: number }
  items: WorkItemReport[]
  lastUpdatedUtc: string
  persisted: boolean
  durationMs: number
}

export function createRefreshDeps(config: RefreshConfig): RefreshDeps {
  return {
    config,
    chain: createSourceChain(config),
    summarizer: new Summarizer({
      generate: config.openaiApiKey
        ? createOpenAISummaryGenerator(config.openaiApiKey, config.summaryModel)
        : null,
      pacer: new FixedIntervalPacer(config.summaryPauseMs),
      timeoutMs: config.summaryTimeoutMs,
    }),
  }
}

async function enrich(
  item: WorkItem,
  source: SourceResult,
  summarizer: RefreshDeps['summarizer']
): Promise<ProcessedArticle[]> {
  const processed: ProcessedArticle[] = []
  for (const article of source.articles) {
    // Placeholder content is not worth a summarization call
    if (source.simulated) {
      processed.push({
        title: article.title,
        content: article.content,
        link: article.link,
        imageUrl: resolveImageUrl(article.imageUrl, null, item.category, article.link),
        trust: untrusted('fallback_source'),
      })
      continue
    }

    const result = await summarizer.summarize({
      title: article.title,
      content: article.content,
      link: article.link,
      category: item.category,
      imageHint: article.imageUrl,
    })
    processed.push({
      title: article.title,
      content: result.summary,
      link: article.link,
      imageUrl: result.imageUrl,
      trust: result.failed ? untrusted('enrichment_failed') : TRUSTED,
    })
  }
  return processed
}

function tally(articles: ProcessedArticle[]) {
  let trusted = 0
  const byReason: Partial<Record<UntrustedReason, number>> = {}
  for (const a of articles) {
    if (a.trust.kind === 'trusted') trusted++
    else byReason[a.trust.reason] = (byReason[a.trust.reason] ?? 0) + 1
  }
  return { trusted, untrusted: byReason }
}

/**
 * Processes a single WorkItem against `store` and returns the next store.
 * A WorkItem that yields nothing leaves the store as it was.
 */
export async function refreshWorkItem(
  store: Store,
  item: WorkItem,
  deps: RefreshDeps
): Promise<{ store: Store; report: WorkItemReport }> {
  const key = workItemKey(item)
  const current = store.regions[item.region.key]?.[item.category.key]
  const source = await deps.chain.fetch(
    item.region,
    item.category,
    deps.config.articlesPerCategory
  )

  if (source.articles.length === 0) {
    console.log(`  ⚠️  No articles for ${key}; keeping existing content`)
    return {
      store,
      report: {
        key,
        status: 'unchanged',
        provider: null,
        trusted: 0,
        untrusted: {},
        bucketSize: current?.length ?? 0,
      },
    }
  }

  const processed = await enrich(item, source, deps.summarizer)
  const bucket = mergeBucket(current, processed, deps.config.maxArticlesPerCategory)
  return {
    store: withBucket(store, item.region.key, item.category.key, bucket),
    report: {
      key,
      status: 'updated',
      provider: source.provider,
      ...tally(processed),
      bucketSize: bucket.length,
    },
  }
}

export async function runRefresh(
  deps: RefreshDeps,
  opts: RefreshOptions = {}
): Promise<RefreshReport> {
  const startedAt = opts.now ?? new Date()
  const start = Date.now()
  const updatesPath = opts.updatesPath ?? deps.config.updatesPath
  const { config } = deps

  const allItems = buildWorkItems(config)
  const window: BatchWindow =
    opts.windowIndex === undefined
      ? selectBatchWindow(allItems, startedAt, config.runsPerDay)
      : sliceWindow(allItems, opts.windowIndex, config.runsPerDay)

  console.log(
    `🔄 Refresh window ${window.index + 1}/${config.runsPerDay}: items ${window.start}-${window.end} of ${allItems.length}`
  )

  let store = await loadStore(updatesPath)
  const items: WorkItemReport[] = []

  // Sequential on purpose: pacing is per upstream and the store has one writer
  for (const item of window.items) {
    const key = workItemKey(item)
    console.log(`📰 ${key}`)
    try {
      const result = await refreshWorkItem(store, item, deps)
      store = result.store
      items.push(result.report)
    } catch (error) {
      console.error(`❌ ${key} failed:`, error)
      items.push({
        key,
        status: 'failed',
        provider: null,
        trusted: 0,
        untrusted: {},
        bucketSize: store.regions[item.region.key]?.[item.category.key]?.length ?? 0,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  const lastUpdatedUtc = startedAt.toISOString()
  store = { ...store, lastUpdatedUtc }

  let persisted = false
  if (opts.dryRun) {
    console.log(`🧪 Dry run: not writing ${updatesPath}`)
  } else {
    try {
      await saveStore(updatesPath, store)
      persisted = true
      console.log(`✅ Saved ${updatesPath}`)
    } catch (error) {
      console.error(`❌ Failed to write ${updatesPath}; previous file kept:`, error)
    }
  }

  const updated = items.filter((i) => i.status === 'updated').length
  console.log(
    `✅ Refresh complete: ${updated}/${items.length} updated (${((Date.now() - start) / 1000).toFixed(1)}s)`
  )

  return {
    window: {
      index: window.index,
      start: window.start,
      end: window.end,
      total: allItems.length,
    },
    items,
    lastUpdatedUtc,
    persisted,
    durationMs: Date.now() - start,
  }
}
