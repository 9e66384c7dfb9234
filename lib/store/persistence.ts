// lib/store/persistence.ts - updates.json load/save
import { promises as fs } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import {
  emptyStore,
  type CategoryBuckets,
  type StoredArticle,
  type Store,
} from '@/lib/models/article'

export const LAST_UPDATED_KEY = 'last_updated_utc'

const nonEmpty = z.string().refine((s) => s.trim().length > 0, 'empty')

const StoredArticleSchema = z
  .object({
    title: nonEmpty,
    content: nonEmpty,
    link: nonEmpty,
    imageUrl: nonEmpty,
    // Missing flag means legacy data of unknown origin: treat as untrusted
    isSimulated: z.boolean().default(true),
  })
  .passthrough()

const RecordSchema = z.record(z.string(), z.unknown())

const RegionSchema = z.record(z.string(), z.array(z.unknown()))

const DocumentSchema = z.record(z.string(), z.unknown())

const LastUpdatedSchema = z.string().nullish()

function isErrnoCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  )
}

export function parseStoreDocument(doc: unknown): Store | null {
  const parsed = DocumentSchema.safeParse(doc)
  if (!parsed.success) return null

  const lastUpdated = LastUpdatedSchema.safeParse(parsed.data[LAST_UPDATED_KEY])
  if (!lastUpdated.success) return null

  const regions: Record<string, CategoryBuckets> = {}
  let dropped = 0

  for (const [regionKey, value] of Object.entries(parsed.data)) {
    if (regionKey === LAST_UPDATED_KEY) continue
    const categories = RegionSchema.safeParse(value)
    if (!categories.success) return null

    const buckets: CategoryBuckets = {}
    for (const [categoryKey, items] of Object.entries(categories.data)) {
      const bucket: StoredArticle[] = []
      for (const item of items) {
        const article = StoredArticleSchema.safeParse(item)
        const raw = RecordSchema.safeParse(item)
        if (article.success && raw.success) {
          // Original key order and unknown fields survive a load/save cycle
          bucket.push({ ...raw.data, ...article.data })
        } else {
          dropped++
        }
      }
      buckets[categoryKey] = bucket
    }
    regions[regionKey] = buckets
  }

  if (dropped > 0) {
    console.warn(`⚠️  Dropped ${dropped} incomplete articles from stored state`)
  }
  return { regions, lastUpdatedUtc: lastUpdated.data ?? null }
}

/** Never throws: absent, unreadable or malformed files all yield an empty store */
export async function loadStore(filePath: string): Promise<Store> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      console.log(`📄 No existing ${filePath}, starting from empty state`)
    } else {
      console.error(`❌ Could not read ${filePath}, starting from empty state:`, error)
    }
    return emptyStore()
  }

  let doc: unknown
  try {
    doc = JSON.parse(text)
  } catch (error) {
    console.error(
      `❌ ${filePath} is not valid JSON, starting from empty state:`,
      error instanceof Error ? error.message : error
    )
    return emptyStore()
  }

  const store = parseStoreDocument(doc)
  if (!store) {
    console.error(`❌ ${filePath} has an unexpected structure, starting from empty state`)
    return emptyStore()
  }
  return store
}

export function serializeStore(store: Store): string {
  const doc: Record<string, unknown> = { ...store.regions }
  doc[LAST_UPDATED_KEY] = store.lastUpdatedUtc
  return JSON.stringify(doc, null, 2) + '\n'
}

/**
 * Write to a sibling temp file, then rename over the target so a reader
 * never sees a half-written document. Rejects on failure.
 */
export async function saveStore(filePath: string, store: Store): Promise<void> {
  const dir = path.dirname(path.resolve(filePath))
  await fs.mkdir(dir, { recursive: true })
  const tmp = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  )
  try {
    await fs.writeFile(tmp, serializeStore(store), 'utf8')
    await fs.rename(tmp, filePath)
  } catch (error) {
    await fs.rm(tmp, { force: true })
    throw error
  }
}
