import { pino } from "pino"
import { createSocialApi } from "../src/api"
import { createTransport } from "../src/transport"
import type { Sync } from "../src/types"
import { decode, postCodec, userProfileCodec } from "../src/wire"

export const BASE_URL = "https://api.test.local"

export const silentLogger = () => pino({ level: "silent" })

export function wireUser(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    username: `user_${id}`,
    email: `${id}@example.com`,
    full_name: `User ${id}`,
    follower_count: 0,
    following_count: 0,
    post_count: 0,
    is_verified: false,
    is_private: false,
    joined_date: "2024-01-01T00:00:00Z",
    last_active_date: "2024-01-02T00:00:00Z",
    ...overrides,
  }
}

export function wirePost(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    author_id: "u1",
    author: wireUser("u1"),
    content: `post ${id}`,
    media_items: [],
    hashtags: [],
    mentions: [],
    like_count: 0,
    comment_count: 0,
    share_count: 0,
    is_liked: false,
    is_bookmarked: false,
    visibility: "public",
    created_at: "2024-03-01T10:00:00Z",
    updated_at: "2024-03-01T10:00:00Z",
    ...overrides,
  }
}

export function wireComment(id: string, postId: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    post_id: postId,
    author_id: "u1",
    author: wireUser("u1"),
    content: `comment ${id}`,
    like_count: 0,
    is_liked: false,
    created_at: "2024-03-01T10:00:00Z",
    updated_at: "2024-03-01T10:00:00Z",
    ...overrides,
  }
}

export function wireMedia(id: string): Record<string, unknown> {
  return { id, type: "image", url: `https://cdn.test.local/${id}.jpg`, width: 640, height: 480, size: 2048 }
}

export function wireStory(id: string): Record<string, unknown> {
  return {
    id,
    author_id: "u1",
    author: wireUser("u1"),
    media_item: wireMedia(`m-${id}`),
    view_count: 0,
    is_viewed: false,
    expires_at: "2024-03-02T10:00:00Z",
    created_at: "2024-03-01T10:00:00Z",
  }
}

export const user = (id: string, overrides: Record<string, unknown> = {}): Sync.UserProfile =>
  decode(userProfileCodec, wireUser(id, overrides))

export const post = (id: string, overrides: Record<string, unknown> = {}): Sync.Post =>
  decode(postCodec, wirePost(id, overrides))

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

export interface RecordedCall {
  method: string
  url: URL
  body?: unknown
}

export type Route = (url: URL, body: unknown) => Response | Promise<Response>

/**
 * In-process stand-in for the backend. Routes are keyed by `"METHOD /path"`;
 * an unknown route answers 404.
 */
export function fakeBackend(routes: Record<string, Route> = {}) {
  const calls: RecordedCall[] = []

  const fetch: Sync.Fetch = async (input, init) => {
    const url = new URL(input)
    const method = init?.method ?? "GET"
    const body = typeof init?.body === "string" ? JSON.parse(init.body) : init?.body
    calls.push({ method, url, body })

    const route = routes[`${method} ${url.pathname}`]
    return route ? route(url, body) : json({ message: "no route" }, 404)
  }

  const transport = createTransport(BASE_URL, fetch)
  const api = createSocialApi(transport, 20)
  return { fetch, calls, transport, api, routes }
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

export function page<T>(count: number, make: (i: number) => T, offset = 0): T[] {
  return Array.from({ length: count }, (_, i) => make(offset + i))
}
