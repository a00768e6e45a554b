import { describe, it, expect } from "vitest"
import { z } from "zod"
import {
  commentCodec,
  createCommentRequestCodec,
  createPostRequestCodec,
  decode,
  notificationItemCodec,
  optional,
  postCodec,
  record,
  scalar,
} from "../src/wire"
import { post, wireComment, wirePost, wireUser } from "./fixtures"

describe("record codecs", () => {
  it("maps snake_case wire keys to camelCase fields", () => {
    const decoded = decode(postCodec, wirePost("p1", { like_count: 7, is_liked: true }))

    expect(decoded.id).toBe("p1")
    expect(decoded.authorId).toBe("u1")
    expect(decoded.author.fullName).toBe("User u1")
    expect(decoded.likeCount).toBe(7)
    expect(decoded.isLiked).toBe(true)
    expect(decoded.createdAt).toBe("2024-03-01T10:00:00Z")
  })

  it("treats null and missing optionals as absent", () => {
    const decoded = decode(postCodec, wirePost("p1", { location: null }))

    expect("location" in decoded).toBe(false)
    expect("bio" in decoded.author).toBe(false)
  })

  it("encodes back to the wire shape, omitting absent optionals", () => {
    expect(postCodec.encode(post("p1"))).toStrictEqual(wirePost("p1"))
  })

  it("decodes nested comment replies", () => {
    const decoded = decode(
      commentCodec,
      wireComment("c1", "p1", { replies: [wireComment("c2", "p1", { parent_comment_id: "c1" })] })
    )

    expect(decoded.replies).toHaveLength(1)
    expect(decoded.replies?.[0]?.parentCommentId).toBe("c1")
    expect(decoded.replies?.[0]?.postId).toBe("p1")
  })

  it("rejects values outside an enumeration", () => {
    expect(() => decode(postCodec, wirePost("p1", { visibility: "everyone" }))).toThrow()
  })

  it("rejects a missing required field", () => {
    const { full_name: _omitted, ...rest } = wireUser("u1")
    expect(() => decode(postCodec, wirePost("p1", { author: rest }))).toThrow()
  })

  it("decodes notifications with an embedded post", () => {
    const decoded = decode(notificationItemCodec, {
      id: "n1",
      type: "like",
      title: "New like",
      message: "User u2 liked your post",
      action_user_id: "u2",
      related_post: wirePost("p9"),
      is_read: false,
      created_at: "2024-03-01T10:00:00Z",
    })

    expect(decoded.actionUserId).toBe("u2")
    expect(decoded.relatedPost?.id).toBe("p9")
    expect(decoded.actionUser).toBeUndefined()
  })
})

describe("request codecs", () => {
  it("omits an absent parent comment id", () => {
    expect(createCommentRequestCodec.encode({ content: "hi" })).toStrictEqual({ content: "hi" })
    expect(createCommentRequestCodec.encode({ content: "re", parentCommentId: "c1" })).toStrictEqual({
      content: "re",
      parent_comment_id: "c1",
    })
  })

  it("encodes location data under snake_case keys", () => {
    const encoded = createPostRequestCodec.encode({
      content: "at the park",
      mediaItems: [],
      visibility: "friends",
      location: { name: "Park", address: "1 Main St", latitude: 1.5, longitude: -2.25, placeId: "pl-1" },
    })

    expect(encoded).toStrictEqual({
      content: "at the park",
      media_items: [],
      visibility: "friends",
      location: { name: "Park", address: "1 Main St", latitude: 1.5, longitude: -2.25, place_id: "pl-1" },
    })
  })
})

describe("record", () => {
  interface Point {
    x: number
    label?: string
  }

  const pointCodec = record<Point>({
    x: ["pos_x", scalar(z.number())],
    label: ["label", optional(scalar(z.string()))],
  })

  it("renames keys in both directions", () => {
    expect(pointCodec.encode({ x: 1 })).toStrictEqual({ pos_x: 1 })
    expect(decode(pointCodec, { pos_x: 2, label: "b" })).toStrictEqual({ x: 2, label: "b" })
  })
})
