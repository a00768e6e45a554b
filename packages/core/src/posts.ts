import { atom } from "@pumped-fn/lite"
import type { Logger } from "pino"
import { socialApiAtom, type SocialApi } from "./api"
import { socialCacheAtom, type SocialCache } from "./cache"
import { isLocationAuthorized, locationProviderAtom } from "./collaborators"
import { PagedCollection } from "./collection"
import { loggerAtom, syncConfigAtom } from "./config"
import type { Transport } from "./transport"
import type { Sync } from "./types"

export const FEED_CACHE_KEY = "feed"

export interface CreatePostInput {
  content: string
  mediaItems?: readonly Sync.MediaItem[]
  visibility?: Sync.PostVisibility
  location?: Sync.LocationData
  /** Tags the post at the device's last known coordinate, when location is authorized. */
  place?: { name: string; address: string; placeId?: string }
}

export function toggledLike(post: Sync.Post): Sync.Post {
  return {
    ...post,
    isLiked: !post.isLiked,
    likeCount: post.isLiked ? Math.max(0, post.likeCount - 1) : post.likeCount + 1,
  }
}

export interface PostManagerDeps {
  api: SocialApi
  cache: SocialCache
  location: Sync.LocationProvider
  logger: Logger
  pageSize: number
}

export class PostManager {
  readonly feed: PagedCollection<Sync.Post>
  private readonly api: SocialApi
  private readonly cache: SocialCache
  private readonly location: Sync.LocationProvider
  private readonly logger: Logger
  private readonly pageSize: number

  constructor(deps: PostManagerDeps) {
    this.api = deps.api
    this.cache = deps.cache
    this.location = deps.location
    this.logger = deps.logger
    this.pageSize = deps.pageSize

    this.feed = new PagedCollection<Sync.Post>(
      async (page, limit) => {
        const result = await this.api.fetchFeed(page, limit)
        if (result.success && page === 1) {
          this.cache.cachePosts(FEED_CACHE_KEY, result.data)
        }
        return result
      },
      { name: "feed", pageSize: deps.pageSize, logger: deps.logger }
    )
  }

  loadFirstPage(): Promise<void> {
    return this.feed.loadFirstPage()
  }

  loadNextPage(): Promise<void> {
    return this.feed.loadNextPage()
  }

  /** Shows the last cached first page while the feed is still empty. */
  hydrateFromCache(): boolean {
    if (this.feed.items.length > 0) return false
    const cached = this.cache.getCachedPosts(FEED_CACHE_KEY)
    if (!cached) return false
    this.feed.hydrate(cached)
    return true
  }

  /**
   * Flips `isLiked` and adjusts `likeCount` at once, then confirms with the
   * server; a rejected confirmation restores the previous record.
   */
  toggleLike(postId: string): Promise<Transport.Result<void> | undefined> {
    return this.feed.optimistic(postId, toggledLike, (before) =>
      before.isLiked ? this.api.unlikePost(before.id) : this.api.likePost(before.id)
    )
  }

  /** Creates the post and puts it at the head of the feed once the server accepts it. */
  async createPost(input: CreatePostInput): Promise<Transport.Result<Sync.Post>> {
    const result = await this.api.createPost({
      content: input.content,
      mediaItems: input.mediaItems ?? [],
      visibility: input.visibility ?? "public",
      location: input.location ?? this.placeLocation(input.place),
    })
    if (!result.success) {
      this.logger.warn({ code: result.error.code, statusCode: result.error.statusCode }, "failed to create post")
      return result
    }
    this.feed.prepend(result.data)
    return result
  }

  async deletePost(postId: string): Promise<Transport.Result<void>> {
    const result = await this.api.deletePost(postId)
    if (!result.success) {
      this.logger.warn({ postId, code: result.error.code, statusCode: result.error.statusCode }, "failed to delete post")
      return result
    }
    this.feed.remove(postId)
    if (this.cache.posts.has(FEED_CACHE_KEY)) {
      this.cache.cachePosts(FEED_CACHE_KEY, this.feed.items.slice(0, this.pageSize))
    }
    return result
  }

  private placeLocation(place: CreatePostInput["place"]): Sync.LocationData | undefined {
    if (!place || !isLocationAuthorized(this.location)) return undefined
    const coordinate = this.location.lastKnownCoordinate()
    if (!coordinate) return undefined
    return {
      name: place.name,
      address: place.address,
      latitude: coordinate.latitude,
      longitude: coordinate.longitude,
      placeId: place.placeId,
    }
  }
}

export const postManagerAtom = atom({
  deps: {
    api: socialApiAtom,
    cache: socialCacheAtom,
    location: locationProviderAtom,
    logger: loggerAtom,
    config: syncConfigAtom,
  },
  factory: (_ctx, { api, cache, location, logger, config }) =>
    new PostManager({
      api,
      cache,
      location,
      logger: logger.child({ component: "posts" }),
      pageSize: config.pageSize,
    }),
})
