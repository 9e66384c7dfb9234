import { describe, it } from 'node:test'
import assert from 'node:assert/strict'

import {
  TRUSTED,
  untrusted,
  type ProcessedArticle,
  type StoredArticle,
  type Store,
} from '@/lib/models/article'
import { dedupeByLink, mergeBucket, withBucket } from '../merge'

function stored(title: string, isSimulated: boolean, link = `https://example.com/${title}`): StoredArticle {
  return { title, content: `${title} body`, link, imageUrl: 'https://img.example.com/x.jpg', isSimulated }
}

function fresh(title: string, trusted: boolean, link = `https://example.com/${title}`): ProcessedArticle {
  return {
    title,
    content: `${title} body`,
    link,
    imageUrl: 'https://img.example.com/x.jpg',
    trust: trusted ? TRUSTED : untrusted('enrichment_failed'),
  }
}

const titles = (bucket: StoredArticle[]) => bucket.map((a) => a.title)

describe('mergeBucket', () => {
  it('evicts simulated leftovers when the batch has trusted content', () => {
    const result = mergeBucket([stored('S', true)], [fresh('N', true)], 30)
    assert.deepEqual(result, [stored('N', false)])
  })

  it('keeps every trusted article when the batch is all untrusted', () => {
    const result = mergeBucket([stored('A', false)], [fresh('B', false)], 30)
    assert.deepEqual(titles(result), ['B', 'A'])
    assert.equal(result[0].isSimulated, true)
    assert.equal(result[1].isSimulated, false)
  })

  it('keeps prior trusted articles behind a mixed batch', () => {
    const prior = [stored('S1', true), stored('T1', false), stored('S2', true), stored('T2', false)]
    const result = mergeBucket(prior, [fresh('N', true), fresh('M', false)], 30)
    assert.deepEqual(titles(result), ['N', 'M', 'T1', 'T2'])
  })

  it('never exceeds the maximum', () => {
    const prior = Array.from({ length: 10 }, (_, i) => stored(`P${i}`, false))
    const batch = Array.from({ length: 5 }, (_, i) => fresh(`N${i}`, true))
    const result = mergeBucket(prior, batch, 7)
    assert.equal(result.length, 7)
    assert.deepEqual(titles(result), ['N0', 'N1', 'N2', 'N3', 'N4', 'P0', 'P1'])
  })

  it('starts an absent bucket from the batch', () => {
    assert.deepEqual(titles(mergeBucket(undefined, [fresh('N', false)], 30)), ['N'])
  })

  it('does not let an untrusted refetch displace a trusted copy', () => {
    const link = 'https://example.com/same'
    const result = mergeBucket([stored('T', false, link)], [fresh('U', false, link)], 30)
    assert.deepEqual(titles(result), ['T'])
  })

  it('treats tracking parameters as the same link', () => {
    const result = mergeBucket(
      [stored('Old', false, 'https://example.com/story?utm_source=feed')],
      [fresh('New', true, 'https://example.com/story')],
      30
    )
    assert.deepEqual(titles(result), ['New'])
  })
})

describe('dedupeByLink', () => {
  it('keeps the first occurrence in place', () => {
    const result = dedupeByLink([
      stored('A', false, 'https://example.com/1'),
      stored('B', false, 'https://example.com/2'),
      stored('C', false, 'https://example.com/1'),
    ])
    assert.deepEqual(titles(result), ['A', 'B'])
  })
})

describe('withBucket', () => {
  it('replaces one bucket and shares everything else', () => {
    const euNews = [stored('EU', false)]
    const euTech = [stored('EUT', false)]
    const asiaNews = [stored('AS', false)]
    const asia = { news: asiaNews }
    const store: Store = {
      regions: { europe: { news: euNews, technology: euTech }, asia },
      lastUpdatedUtc: '2026-10-18T00:00:00.000Z',
    }
    const replacement = [stored('NEW', false)]
    const next = withBucket(store, 'europe', 'news', replacement)

    assert.equal(next.regions.europe.news, replacement)
    assert.equal(next.regions.europe.technology, euTech)
    assert.equal(next.regions.asia, asia)
    assert.equal(store.regions.europe.news, euNews)
    assert.equal(next.lastUpdatedUtc, store.lastUpdatedUtc)
  })

  it('creates missing regions', () => {
    const next = withBucket({ regions: {}, lastUpdatedUtc: null }, 'oceania', 'travel', [])
    assert.deepEqual(next.regions, { oceania: { travel: [] } })
  })
})
