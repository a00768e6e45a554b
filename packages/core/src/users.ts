import { atom } from "@pumped-fn/lite"
import type { Logger } from "pino"
import { socialApiAtom, type SocialApi } from "./api"
import { settingsStoreAtom } from "./collaborators"
import { PagedCollection } from "./collection"
import { loggerAtom, syncConfigAtom } from "./config"
import type { TransportError } from "./errors"
import { Store } from "./store"
import type { Transport } from "./transport"
import type { Sync } from "./types"

export interface UserSearch {
  readonly query: string
  readonly results: PagedCollection<Sync.UserProfile>
}

export interface UserState {
  readonly currentUser?: Sync.UserProfile
  readonly isLoading: boolean
  readonly error?: TransportError
  /** Most recent search; earlier ones are dropped when a new query starts. */
  readonly search?: UserSearch
}

export interface UserManagerOptions {
  currentUserKey: string
  pageSize: number
  logger: Logger
}

export class UserManager extends Store<UserState> {
  constructor(
    private readonly api: SocialApi,
    private readonly settings: Sync.SettingsStore,
    private readonly options: UserManagerOptions
  ) {
    super({ isLoading: false })
  }

  get currentUser(): Sync.UserProfile | undefined {
    return this.state.currentUser
  }

  /**
   * Loads the profile whose id is stored under the current user key.
   * Does nothing when no id is stored or a load is already running.
   */
  async loadCurrentUser(): Promise<void> {
    if (this.state.isLoading) return
    const userId = this.settings.getString(this.options.currentUserKey)
    if (!userId) return

    this.commit({ ...this.state, isLoading: true, error: undefined })
    const result = await this.api.fetchUserProfile(userId)
    if (!result.success) {
      this.commit({ ...this.state, isLoading: false, error: result.error })
      this.warn(result.error, "failed to load current user", { userId })
      return
    }
    this.commit({ ...this.state, currentUser: result.data, isLoading: false })
  }

  async updateProfile(profile: Sync.UserProfile): Promise<Transport.Result<Sync.UserProfile>> {
    const result = await this.api.updateUserProfile(profile)
    if (!result.success) {
      this.commit({ ...this.state, error: result.error })
      this.warn(result.error, "failed to update profile", { userId: profile.id })
      return result
    }
    this.commit({ ...this.state, currentUser: result.data, error: undefined })
    return result
  }

  /**
   * Starts a search in a collection of its own. A slower earlier query can
   * only ever fill its own, already replaced, collection.
   *
   * @example
   * ```typescript
   * const results = await users.search("ada")
   * await results.loadNextPage()
   * ```
   */
  async search(query: string): Promise<PagedCollection<Sync.UserProfile>> {
    const results = new PagedCollection<Sync.UserProfile>(
      (page, limit) => this.api.searchUsers(query, page, limit),
      { name: "user-search", pageSize: this.options.pageSize, logger: this.options.logger }
    )
    this.commit({ ...this.state, search: { query, results } })
    await results.loadFirstPage()
    return results
  }

  private warn(error: TransportError, msg: string, context: Record<string, unknown>): void {
    this.options.logger.warn({ code: error.code, statusCode: error.statusCode, ...context }, msg)
  }
}

export const userManagerAtom = atom({
  deps: {
    api: socialApiAtom,
    settings: settingsStoreAtom,
    logger: loggerAtom,
    config: syncConfigAtom,
  },
  factory: (_ctx, { api, settings, logger, config }) =>
    new UserManager(api, settings, {
      currentUserKey: config.currentUserKey,
      pageSize: config.pageSize,
      logger: logger.child({ component: "users" }),
    }),
})
