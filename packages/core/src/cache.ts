import { atom } from "@pumped-fn/lite"
import type { Logger } from "pino"
import { loggerAtom, syncConfigAtom, type CacheLimits } from "./config"
import type { Sync } from "./types"
import { list, postCodec } from "./wire"

interface CacheEntry<V> {
  value: V
  cost: number
}

/**
 * Least-recently-used cache bounded by entry count and by total cost.
 *
 * Recency lives in the Map's insertion order: a hit re-inserts the entry at
 * the end, so the first key is always the eviction candidate and ties fall
 * back to insertion order.
 */
export class LruCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>()
  private total = 0

  constructor(
    readonly maxEntries: number,
    readonly maxTotalCost: number
  ) {
    if (maxEntries < 1 || maxTotalCost < 1) {
      throw new RangeError("cache limits must be positive")
    }
  }

  get size(): number {
    return this.entries.size
  }

  get totalCost(): number {
    return this.total
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    this.entries.delete(key)
    this.entries.set(key, entry)
    return entry.value
  }

  /**
   * Inserts or replaces `key`, then evicts least recently used entries other
   * than `key` until both limits hold. An entry whose own cost exceeds the
   * limit is kept alone. Negative costs count as zero.
   */
  put(key: string, value: V, cost: number): void {
    if (!Number.isFinite(cost)) {
      throw new RangeError(`cache cost must be finite, got ${cost}`)
    }
    this.delete(key)
    const entryCost = Math.max(0, cost)
    this.entries.set(key, { value, cost: entryCost })
    this.total += entryCost

    while (this.entries.size > this.maxEntries || this.total > this.maxTotalCost) {
      const oldest = this.entries.keys().next()
      if (oldest.done || oldest.value === key) break
      this.delete(oldest.value)
    }
  }

  delete(key: string): boolean {
    const entry = this.entries.get(key)
    if (!entry) return false
    this.entries.delete(key)
    this.total -= entry.cost
    return true
  }

  clear(): void {
    this.entries.clear()
    this.total = 0
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }
}

const postsCodec = list(postCodec)

/**
 * Decoded images keyed by URL and serialized post collections keyed by feed id.
 */
export class SocialCache {
  readonly images: LruCache<Sync.Image>
  readonly posts: LruCache<Uint8Array>
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder()

  constructor(
    imageLimits: CacheLimits,
    postLimits: CacheLimits,
    private readonly logger: Logger
  ) {
    this.images = new LruCache(imageLimits.maxEntries, imageLimits.maxTotalCost)
    this.posts = new LruCache(postLimits.maxEntries, postLimits.maxTotalCost)
  }

  cacheImage(url: string, image: Sync.Image, cost: number): void {
    this.images.put(url, image, cost)
  }

  getCachedImage(url: string): Sync.Image | undefined {
    return this.images.get(url)
  }

  cachePosts(key: string, posts: readonly Sync.Post[]): void {
    const bytes = this.encoder.encode(JSON.stringify(postsCodec.encode(posts)))
    this.posts.put(key, bytes, bytes.byteLength)
  }

  getCachedPosts(key: string): readonly Sync.Post[] | undefined {
    const bytes = this.posts.get(key)
    if (!bytes) return undefined

    try {
      return postsCodec.schema.parse(JSON.parse(this.decoder.decode(bytes)))
    } catch (error) {
      this.logger.warn({ key, err: error }, "failed to decode cached posts")
      this.posts.delete(key)
      return undefined
    }
  }

  clear(): void {
    this.images.clear()
    this.posts.clear()
  }
}

export const socialCacheAtom = atom({
  deps: { config: syncConfigAtom, logger: loggerAtom },
  factory: (_ctx, { config, logger }) =>
    new SocialCache(config.imageCache, config.postCache, logger.child({ component: "cache" })),
})
