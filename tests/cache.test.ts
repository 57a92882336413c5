import { describe, expect, it } from 'vitest'
import { MemoryResultCache, NoopResultCache, featureCacheKey } from '../src/cache.js'
import { fakeClock } from './helpers/explorer.js'

describe('MemoryResultCache', () => {
  it('returns a stored value with its timestamps', () => {
    const clock = fakeClock(1_000)
    const cache = new MemoryResultCache<string>(clock)

    cache.set('k', 'v', 500)

    expect(cache.get('k')).toEqual({ key: 'k', value: 'v', cachedAt: 1_000, expiresAt: 1_500 })
  })

  it('drops an entry once its ttl has passed', () => {
    const clock = fakeClock(1_000)
    const cache = new MemoryResultCache<string>(clock)
    cache.set('k', 'v', 500)

    clock.advance(500)
    expect(cache.get('k')?.value).toBe('v')

    clock.advance(1)
    expect(cache.get('k')).toBeUndefined()
    expect(cache.size()).toBe(0)
  })

  it('keeps expired entries until they are looked up', () => {
    const clock = fakeClock()
    const cache = new MemoryResultCache<number>(clock)
    cache.set('a', 1, 10)
    clock.advance(100)
    expect(cache.size()).toBe(1)
  })

  it('overwrites and deletes', () => {
    const cache = new MemoryResultCache<number>(fakeClock())
    cache.set('a', 1, 1_000)
    cache.set('a', 2, 1_000)
    expect(cache.get('a')?.value).toBe(2)
    expect(cache.delete('a')).toBe(true)
    expect(cache.delete('a')).toBe(false)
  })
})

describe('NoopResultCache', () => {
  it('never returns what was stored', () => {
    const cache = new NoopResultCache<string>(fakeClock())
    cache.set('k', 'v', 1_000)
    expect(cache.get()).toBeUndefined()
    expect(cache.size()).toBe(0)
  })
})

describe('featureCacheKey', () => {
  it('normalizes the wallet to lowercase', () => {
    expect(featureCacheKey('0xABCDEF0000000000000000000000000000000001', 'aave', 30, 0)).toBe(
      'features:0xabcdef0000000000000000000000000000000001:aave:30:0',
    )
  })
})
