import { describe, it, expect } from "vitest"
import { LruCache, SocialCache } from "../src/cache"
import { post, silentLogger } from "./fixtures"

describe("LruCache", () => {
  it("evicts the least recently used entry past the count limit", () => {
    const cache = new LruCache<string>(2, 100)
    cache.put("a", "A", 1)
    cache.put("b", "B", 1)
    cache.put("c", "C", 1)

    expect(cache.keys()).toEqual(["b", "c"])
    expect(cache.get("a")).toBeUndefined()
  })

  it("refreshes recency on a hit", () => {
    const cache = new LruCache<string>(2, 100)
    cache.put("a", "A", 1)
    cache.put("b", "B", 1)
    expect(cache.get("a")).toBe("A")
    cache.put("c", "C", 1)

    expect(cache.has("a")).toBe(true)
    expect(cache.has("b")).toBe(false)
  })

  it("evicts by total cost", () => {
    const cache = new LruCache<string>(10, 10)
    cache.put("a", "A", 4)
    cache.put("b", "B", 4)
    cache.put("c", "C", 4)

    expect(cache.keys()).toEqual(["b", "c"])
    expect(cache.totalCost).toBe(8)
  })

  it("keeps a single oversize entry alone", () => {
    const cache = new LruCache<string>(10, 10)
    cache.put("a", "A", 3)
    cache.put("big", "BIG", 50)

    expect(cache.keys()).toEqual(["big"])
    expect(cache.totalCost).toBe(50)
  })

  it("replaces an existing key and its cost", () => {
    const cache = new LruCache<string>(10, 100)
    cache.put("a", "A", 5)
    cache.put("a", "A2", 7)

    expect(cache.size).toBe(1)
    expect(cache.totalCost).toBe(7)
    expect(cache.get("a")).toBe("A2")
  })

  it("deletes and clears", () => {
    const cache = new LruCache<string>(10, 100)
    cache.put("a", "A", 5)
    cache.put("b", "B", 5)

    expect(cache.delete("a")).toBe(true)
    expect(cache.delete("a")).toBe(false)
    expect(cache.totalCost).toBe(5)

    cache.clear()
    expect(cache.size).toBe(0)
    expect(cache.totalCost).toBe(0)
  })

  it("rejects a non-finite cost and keeps enforcing the limit", () => {
    const cache = new LruCache<string>(10, 100)

    expect(() => cache.put("a", "A", Number.NaN)).toThrow(RangeError)
    expect(() => cache.put("a", "A", Number.POSITIVE_INFINITY)).toThrow(RangeError)
    expect(cache.has("a")).toBe(false)

    cache.put("b", "B", 90)
    cache.put("c", "C", 90)

    expect(cache.keys()).toEqual(["c"])
    expect(cache.totalCost).toBe(90)
  })

  it("counts a negative cost as zero", () => {
    const cache = new LruCache<string>(10, 100)
    cache.put("a", "A", -5)

    expect(cache.totalCost).toBe(0)
  })

  it("rejects non-positive limits", () => {
    expect(() => new LruCache(0, 10)).toThrow(RangeError)
    expect(() => new LruCache(10, 0)).toThrow(RangeError)
  })
})

describe("SocialCache", () => {
  const limits = { maxEntries: 10, maxTotalCost: 1_000_000 }

  it("stores posts as serialized bytes and restores them", () => {
    const cache = new SocialCache(limits, limits, silentLogger())
    const posts = [post("p1", { like_count: 3 }), post("p2")]

    cache.cachePosts("feed", posts)

    expect(cache.getCachedPosts("feed")).toEqual(posts)
    const bytes = cache.posts.get("feed")
    expect(bytes).toBeInstanceOf(Uint8Array)
    expect(cache.posts.totalCost).toBe(bytes?.byteLength)
  })

  it("drops an entry that no longer decodes", () => {
    const cache = new SocialCache(limits, limits, silentLogger())
    cache.posts.put("feed", new TextEncoder().encode("[{\"id\":1}]"), 10)

    expect(cache.getCachedPosts("feed")).toBeUndefined()
    expect(cache.posts.has("feed")).toBe(false)
  })

  it("keeps images and posts in independent caches", () => {
    const cache = new SocialCache({ maxEntries: 1, maxTotalCost: 100 }, limits, silentLogger())
    cache.cacheImage("https://cdn.test.local/a.png", { width: 1, height: 1 }, 10)
    cache.cachePosts("feed", [post("p1")])
    cache.cacheImage("https://cdn.test.local/b.png", { width: 2, height: 2 }, 10)

    expect(cache.getCachedImage("https://cdn.test.local/a.png")).toBeUndefined()
    expect(cache.getCachedImage("https://cdn.test.local/b.png")).toEqual({ width: 2, height: 2 })
    expect(cache.getCachedPosts("feed")).toHaveLength(1)

    cache.clear()
    expect(cache.images.size).toBe(0)
    expect(cache.posts.size).toBe(0)
  })
})
