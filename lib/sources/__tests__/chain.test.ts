import { describe, it } from 'node:test'
import assert from 'node:assert/strict'

import type { CategoryDef, RegionDef } from '@/config/regions'
import { SourceChain } from '../chain'
import type { ContentProvider, RawArticle } from '../types'

const region: RegionDef = { key: 'europe', name: 'Europe', countries: ['gb'] }
const category: CategoryDef = { key: 'news', label: 'News', keywords: 'news' }

function raws(prefix: string, n: number): RawArticle[] {
  return Array.from({ length: n }, (_, i) => ({
    title: `${prefix} ${i + 1}`,
    content: `Body ${i + 1}`,
    link: `https://example.com/${prefix}/${i + 1}`,
  }))
}

type FakeProvider = ContentProvider & { calls: number }

function provider(
  name: string,
  fetchImpl: () => Promise<RawArticle[]>,
  opts: { configured?: boolean; simulated?: boolean } = {}
): FakeProvider {
  const p: FakeProvider = {
    name,
    simulated: opts.simulated ?? false,
    calls: 0,
    isConfigured: () => opts.configured ?? true,
    fetch: async () => {
      p.calls++
      return fetchImpl()
    },
  }
  return p
}

describe('SourceChain.fetch', () => {
  it('stops at the first provider with results', async () => {
    const a = provider('a', async () => raws('a', 1))
    const b = provider('b', async () => raws('b', 5))
    const result = await new SourceChain([a, b]).fetch(region, category, 5)
    assert.equal(result.provider, 'a')
    assert.equal(result.articles.length, 1)
    assert.equal(result.simulated, false)
    assert.equal(b.calls, 0)
  })

  it('skips providers that are not configured', async () => {
    const a = provider('a', async () => raws('a', 3), { configured: false })
    const b = provider('b', async () => raws('b', 2))
    const result = await new SourceChain([a, b]).fetch(region, category, 5)
    assert.equal(a.calls, 0)
    assert.equal(result.provider, 'b')
    assert.equal(result.articles.length, 2)
  })

  it('moves on when a provider throws', async () => {
    const a = provider('a', async () => {
      throw new Error('HTTP 429: Too Many Requests')
    })
    const b = provider('b', async () => raws('b', 2))
    const result = await new SourceChain([a, b]).fetch(region, category, 5)
    assert.equal(result.provider, 'b')
  })

  it('moves on when nothing survives normalization', async () => {
    const a = provider('a', async () => [{ title: 'No link', content: 'Body' }])
    const b = provider('b', async () => raws('b', 1))
    const result = await new SourceChain([a, b]).fetch(region, category, 5)
    assert.equal(result.provider, 'b')
    assert.equal(result.articles[0].title, 'b 1')
  })

  it('returns an empty result when every provider is dry', async () => {
    const a = provider('a', async () => [])
    const b = provider('b', async () => [])
    const result = await new SourceChain([a, b]).fetch(region, category, 5)
    assert.deepEqual(result, { provider: null, simulated: false, articles: [] })
  })

  it('truncates to the requested count', async () => {
    const a = provider('a', async () => raws('a', 8))
    const result = await new SourceChain([a]).fetch(region, category, 3)
    assert.deepEqual(
      result.articles.map((x) => x.title),
      ['a 1', 'a 2', 'a 3']
    )
  })

  it('reports whether the winning provider is simulated', async () => {
    const a = provider('a', async () => [])
    const sim = provider('sim', async () => raws('sim', 2), { simulated: true })
    const chain = new SourceChain([a, sim])
    const result = await chain.fetch(region, category, 5)
    assert.equal(result.provider, 'sim')
    assert.equal(result.simulated, true)
    assert.deepEqual(chain.providerNames, ['a', 'sim'])
  })
})
