/**
 * Volatile result cache.
 *
 * Purely a latency/cost saver in front of the pipeline — results are the same
 * with or without it. Expired entries are dropped lazily on lookup; there is
 * no background sweep. The `ResultCache` interface is what the pipeline
 * depends on, so a shared store can replace the in-memory map later.
 */
import { systemClock, type Clock } from './utils/clock.js'

export interface CacheEntry<T> {
  key: string
  value: T
  /** Epoch ms the entry was stored */
  cachedAt: number
  /** Epoch ms after which the entry reads as absent */
  expiresAt: number
}

export interface ResultCache<T> {
  get(key: string): CacheEntry<T> | undefined
  set(key: string, value: T, ttlMs: number): CacheEntry<T>
  delete(key: string): boolean
  size(): number
}

export class MemoryResultCache<T> implements ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()

  constructor(private readonly clock: Clock = systemClock) {}

  get(key: string): CacheEntry<T> | undefined {
    const hit = this.entries.get(key)
    if (!hit) return undefined
    if (this.clock.now() > hit.expiresAt) {
      this.entries.delete(key)
      return undefined
    }
    return hit
  }

  set(key: string, value: T, ttlMs: number): CacheEntry<T> {
    const now = this.clock.now()
    const entry: CacheEntry<T> = { key, value, cachedAt: now, expiresAt: now + ttlMs }
    this.entries.set(key, entry)
    return entry
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  /** Stored entries, including expired ones not yet looked up. */
  size(): number {
    return this.entries.size
  }
}

/** Cache that never stores anything; the pipeline must behave identically with it. */
export class NoopResultCache<T> implements ResultCache<T> {
  constructor(private readonly clock: Clock = systemClock) {}

  get(): CacheEntry<T> | undefined {
    return undefined
  }

  set(key: string, value: T, ttlMs: number): CacheEntry<T> {
    const now = this.clock.now()
    return { key, value, cachedAt: now, expiresAt: now + ttlMs }
  }

  delete(): boolean {
    return false
  }

  size(): number {
    return 0
  }
}

export function featureCacheKey(wallet: string, profile: string, windowDays: number, offsetDays: number): string {
  return `features:${wallet.toLowerCase()}:${profile}:${windowDays}:${offsetDays}`
}
