import { atom } from "@pumped-fn/lite"
import { Store } from "./store"
import type { Sync } from "./types"

export interface NotificationState {
  readonly items: readonly Sync.NotificationItem[]
  readonly unreadCount: number
}

const countUnread = (items: readonly Sync.NotificationItem[]) => items.filter((item) => !item.isRead).length

/** In-memory notification list. Read marks are local and never sent to the server. */
export class NotificationManager extends Store<NotificationState> {
  constructor() {
    super({ items: [], unreadCount: 0 })
  }

  get unreadCount(): number {
    return this.state.unreadCount
  }

  setNotifications(items: readonly Sync.NotificationItem[]): void {
    this.commit({ items, unreadCount: countUnread(items) })
  }

  /** Returns false when `id` is unknown or already read. */
  markAsRead(id: string): boolean {
    const target = this.state.items.find((item) => item.id === id)
    if (!target || target.isRead) return false
    const items = this.state.items.map((item) => (item.id === id ? { ...item, isRead: true } : item))
    this.commit({ items, unreadCount: countUnread(items) })
    return true
  }

  markAllAsRead(): void {
    if (this.state.unreadCount === 0) return
    const items = this.state.items.map((item) => (item.isRead ? item : { ...item, isRead: true }))
    this.commit({ items, unreadCount: 0 })
  }
}

export const notificationManagerAtom = atom({
  factory: () => new NotificationManager(),
})
