import { atom } from "@pumped-fn/lite"
import type { Logger } from "pino"
import { socialApiAtom, type SocialApi } from "./api"
import { PagedCollection } from "./collection"
import { loggerAtom, syncConfigAtom } from "./config"
import type { Transport } from "./transport"
import type { Sync } from "./types"

export class StoryManager {
  readonly stories: PagedCollection<Sync.Story>

  constructor(
    private readonly api: SocialApi,
    private readonly logger: Logger,
    pageSize: number
  ) {
    this.stories = new PagedCollection<Sync.Story>((page, limit) => this.api.fetchStories(page, limit), {
      name: "stories",
      pageSize,
      logger,
    })
  }

  loadFirstPage(): Promise<void> {
    return this.stories.loadFirstPage()
  }

  loadNextPage(): Promise<void> {
    return this.stories.loadNextPage()
  }

  async createStory(request: Sync.CreateStoryRequest): Promise<Transport.Result<Sync.Story>> {
    const result = await this.api.createStory(request)
    if (!result.success) {
      this.logger.warn({ code: result.error.code, statusCode: result.error.statusCode }, "failed to create story")
      return result
    }
    this.stories.prepend(result.data)
    return result
  }
}

export const storyManagerAtom = atom({
  deps: { api: socialApiAtom, logger: loggerAtom, config: syncConfigAtom },
  factory: (_ctx, { api, logger, config }) =>
    new StoryManager(api, logger.child({ component: "stories" }), config.pageSize),
})
