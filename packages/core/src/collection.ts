import type { Logger } from "pino"
import type { TransportError } from "./errors"
import { Store } from "./store"
import type { Transport } from "./transport"
import type { Sync } from "./types"

export type PageFetcher<T> = (page: number, limit: number) => Promise<Transport.Result<readonly T[]>>

export interface CollectionOptions {
  /** Used in log lines */
  name: string
  pageSize: number
  logger: Logger
}

export function emptyPageState<T extends Sync.Entity>(): Sync.PageState<T> {
  return { items: [], currentPage: 1, hasMore: true, isLoading: false }
}

/**
 * Ordered, paginated list of entities with an at-most-one-outstanding-fetch
 * guard and optimistic single-entity mutations.
 *
 * All transitions run synchronously between awaits, so the state object is
 * always whole; each change publishes a new object to subscribers.
 */
export class PagedCollection<T extends Sync.Entity> extends Store<Sync.PageState<T>> {
  private readonly pending = new Set<string>()

  constructor(
    private readonly fetchPage: PageFetcher<T>,
    private readonly options: CollectionOptions
  ) {
    super(emptyPageState<T>())
  }

  get items(): readonly T[] {
    return this.state.items
  }

  /**
   * Fetches page 1 and replaces the items. Ignored while a fetch is
   * outstanding. On failure items, page and `hasMore` keep their prior values.
   */
  async loadFirstPage(): Promise<void> {
    if (this.state.isLoading) return
    await this.load(1, true)
  }

  /** Fetches `currentPage` and appends it. No-op while loading or once `hasMore` is false. */
  async loadNextPage(): Promise<void> {
    if (this.state.isLoading || !this.state.hasMore) return
    await this.load(this.state.currentPage, false)
  }

  find(id: string): T | undefined {
    return this.state.items.find((item) => item.id === id)
  }

  /** Swaps the entity with the same id for `next`. Returns false when absent. */
  replace(next: T): boolean {
    if (!this.find(next.id)) return false
    this.commit({ ...this.state, items: this.swapped(next) })
    return true
  }

  prepend(item: T): void {
    this.commit({ ...this.state, items: [item, ...this.state.items] })
  }

  remove(id: string): boolean {
    const items = this.state.items.filter((item) => item.id !== id)
    if (items.length === this.state.items.length) return false
    this.commit({ ...this.state, items })
    return true
  }

  /**
   * Restores a previously fetched first page, e.g. from cache. Paging resumes
   * as if page 1 had just loaded.
   */
  hydrate(items: readonly T[]): void {
    this.commit({ ...this.state, items, currentPage: 2, hasMore: items.length === this.options.pageSize })
  }

  /**
   * Applies `mutate` to the entity immediately, then awaits `confirm`. A failed
   * confirmation restores the exact pre-mutation record. While one mutation
   * for an id is pending, further ones for that id are ignored.
   *
   * @returns the confirmation result, or `undefined` when nothing was attempted
   */
  async optimistic<R>(
    id: string,
    mutate: (entity: T) => T,
    confirm: (snapshot: T) => Promise<Transport.Result<R>>
  ): Promise<Transport.Result<R> | undefined> {
    const snapshot = this.find(id)
    if (!snapshot || this.pending.has(id)) return undefined

    this.pending.add(id)
    this.replace(mutate(snapshot))

    let result: Transport.Result<R>
    try {
      result = await confirm(snapshot)
    } catch (error) {
      this.commit({ ...this.state, items: this.swapped(snapshot) })
      this.options.logger.warn({ collection: this.options.name, id, err: error }, "optimistic update rolled back")
      throw error
    } finally {
      this.pending.delete(id)
    }

    if (!result.success) {
      this.commit({ ...this.state, items: this.swapped(snapshot), error: result.error })
      this.warn(result.error, "optimistic update rolled back", { id })
    }
    return result
  }

  private async load(page: number, refresh: boolean): Promise<void> {
    const { pageSize, logger, name } = this.options
    this.commit({ ...this.state, isLoading: true, error: undefined })

    let result: Transport.Result<readonly T[]>
    try {
      result = await this.fetchPage(page, pageSize)
    } catch (error) {
      this.commit({ ...this.state, isLoading: false })
      throw error
    }
    if (!result.success) {
      this.commit({ ...this.state, isLoading: false, error: result.error })
      this.warn(result.error, "page fetch failed", { page })
      return
    }

    const received = result.data
    this.commit({
      items: refresh ? received : [...this.state.items, ...received],
      currentPage: page + 1,
      hasMore: received.length === pageSize,
      isLoading: false,
    })
    logger.debug({ collection: name, page, count: received.length }, "page loaded")
  }

  private swapped(next: T): readonly T[] {
    return this.state.items.map((item) => (item.id === next.id ? next : item))
  }

  private warn(error: TransportError, msg: string, context: Record<string, unknown>): void {
    this.options.logger.warn(
      { collection: this.options.name, code: error.code, statusCode: error.statusCode, ...context },
      msg
    )
  }
}
