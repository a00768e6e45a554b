import { atom } from "@pumped-fn/lite"
import type { Logger } from "pino"
import { socialApiAtom, type SocialApi } from "./api"
import { PagedCollection } from "./collection"
import { loggerAtom, syncConfigAtom } from "./config"
import type { Transport } from "./transport"
import type { Sync } from "./types"

/**
 * Comment threads keyed by post id. A thread is created the first time it
 * is asked for and lives as long as the manager.
 */
export class CommentManager {
  private readonly threads = new Map<string, PagedCollection<Sync.Comment>>()

  constructor(
    private readonly api: SocialApi,
    private readonly logger: Logger,
    private readonly pageSize: number
  ) {}

  thread(postId: string): PagedCollection<Sync.Comment> {
    let thread = this.threads.get(postId)
    if (!thread) {
      thread = new PagedCollection<Sync.Comment>((page, limit) => this.api.fetchComments(postId, page, limit), {
        name: `comments:${postId}`,
        pageSize: this.pageSize,
        logger: this.logger,
      })
      this.threads.set(postId, thread)
    }
    return thread
  }

  loadFirstPage(postId: string): Promise<void> {
    return this.thread(postId).loadFirstPage()
  }

  loadNextPage(postId: string): Promise<void> {
    return this.thread(postId).loadNextPage()
  }

  async createComment(
    postId: string,
    content: string,
    parentCommentId?: string
  ): Promise<Transport.Result<Sync.Comment>> {
    const result = await this.api.createComment(postId, { content, parentCommentId })
    if (!result.success) {
      this.logger.warn(
        { postId, code: result.error.code, statusCode: result.error.statusCode },
        "failed to create comment"
      )
      return result
    }
    this.thread(postId).prepend(result.data)
    return result
  }
}

export const commentManagerAtom = atom({
  deps: { api: socialApiAtom, logger: loggerAtom, config: syncConfigAtom },
  factory: (_ctx, { api, logger, config }) =>
    new CommentManager(api, logger.child({ component: "comments" }), config.pageSize),
})
