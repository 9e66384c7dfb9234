import { afterEach, beforeEach, describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import type { Store } from '@/lib/models/article'
import { loadStore, parseStoreDocument, saveStore, serializeStore } from '../persistence'

const article = {
  title: 'Harbour reopens',
  content: 'The harbour reopened after repairs.',
  link: 'https://example.com/harbour',
  imageUrl: 'https://img.example.com/harbour.jpg',
  isSimulated: false,
}

const sample: Store = {
  regions: {
    europe: { news: [article], travel: [] },
    asia: { technology: [{ ...article, link: 'https://example.com/b', isSimulated: true }] },
  },
  lastUpdatedUtc: '2026-10-19T06:00:00.000Z',
}

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'updates-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

const empty: Store = { regions: {}, lastUpdatedUtc: null }

describe('loadStore', () => {
  it('returns an empty store for a missing file', async () => {
    assert.deepEqual(await loadStore(path.join(dir, 'missing.json')), empty)
  })

  it('returns an empty store for invalid JSON', async () => {
    const file = path.join(dir, 'updates.json')
    await fs.writeFile(file, '{ not json', 'utf8')
    assert.deepEqual(await loadStore(file), empty)
  })

  it('returns an empty store for the wrong top-level shape', async () => {
    const file = path.join(dir, 'updates.json')
    await fs.writeFile(file, '[1, 2, 3]', 'utf8')
    assert.deepEqual(await loadStore(file), empty)
  })

  it('returns an empty store when a region is not an object of arrays', async () => {
    const file = path.join(dir, 'updates.json')
    await fs.writeFile(file, JSON.stringify({ europe: { news: 'oops' } }), 'utf8')
    assert.deepEqual(await loadStore(file), empty)
  })

  it('reads back what saveStore wrote', async () => {
    const file = path.join(dir, 'updates.json')
    await saveStore(file, sample)
    assert.deepEqual(await loadStore(file), sample)
  })
})

describe('parseStoreDocument', () => {
  it('defaults a missing isSimulated flag to true', () => {
    const { isSimulated: _omit, ...legacy } = article
    const store = parseStoreDocument({ europe: { news: [legacy] } })
    assert.equal(store?.regions.europe.news[0].isSimulated, true)
    assert.equal(store?.lastUpdatedUtc, null)
  })

  it('drops incomplete articles and keeps the rest', () => {
    const store = parseStoreDocument({
      europe: { news: [article, { ...article, title: '' }, { title: 'only a title' }] },
      last_updated_utc: '2026-10-19T06:00:00.000Z',
    })
    assert.deepEqual(store?.regions.europe.news, [article])
    assert.equal(store?.lastUpdatedUtc, '2026-10-19T06:00:00.000Z')
  })

  it('keeps unknown article fields in their original order', () => {
    const extended = { publishedAt: '2026-10-01', ...article, source: 'Wire' }
    const store = parseStoreDocument({ europe: { news: [extended] } })
    const loaded = store?.regions.europe.news[0]
    assert.deepEqual(loaded, extended)
    assert.deepEqual(Object.keys(loaded ?? {}), [
      'publishedAt',
      'title',
      'content',
      'link',
      'imageUrl',
      'isSimulated',
      'source',
    ])
  })

  it('rejects a non-string timestamp', () => {
    assert.equal(parseStoreDocument({ last_updated_utc: 42 }), null)
  })
})

describe('serializeStore', () => {
  it('writes regions first, then the timestamp, with a trailing newline', () => {
    const text = serializeStore(sample)
    assert.ok(text.endsWith('}\n'))
    assert.deepEqual(Object.keys(JSON.parse(text)), ['europe', 'asia', 'last_updated_utc'])
  })
})

describe('saveStore', () => {
  it('leaves no temp files behind', async () => {
    const file = path.join(dir, 'updates.json')
    await saveStore(file, sample)
    await saveStore(file, { ...sample, lastUpdatedUtc: '2026-10-19T09:00:00.000Z' })
    assert.deepEqual(await fs.readdir(dir), ['updates.json'])
    const doc = JSON.parse(await fs.readFile(file, 'utf8'))
    assert.equal(doc.last_updated_utc, '2026-10-19T09:00:00.000Z')
  })

  it('creates missing directories', async () => {
    const file = path.join(dir, 'public', 'data', 'updates.json')
    await saveStore(file, sample)
    assert.deepEqual(await loadStore(file), sample)
  })

  it('rejects when the target cannot be replaced and cleans up', async () => {
    const target = path.join(dir, 'updates.json')
    await fs.mkdir(target)
    await fs.writeFile(path.join(target, 'keep.txt'), 'x', 'utf8')
    await assert.rejects(saveStore(target, sample))
    assert.deepEqual(await fs.readdir(dir), ['updates.json'])
  })
})
