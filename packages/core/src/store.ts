import type { Sync } from "./types"

/**
 * Holder of one immutable state object. Subclasses publish changes through
 * `commit`, which swaps the whole object and notifies subscribers in order.
 */
export abstract class Store<S> {
  private readonly listeners = new Set<Sync.Listener>()

  protected constructor(private current: S) {}

  get state(): S {
    return this.current
  }

  subscribe(listener: Sync.Listener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  protected commit(next: S): void {
    this.current = next
    for (const listener of this.listeners) {
      listener()
    }
  }
}
