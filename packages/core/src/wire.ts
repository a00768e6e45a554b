import { z } from "zod"
import type { Sync } from "./types"

/**
 * Two-way mapping between an in-memory record and its JSON wire shape.
 * `schema` validates wire input and produces the in-memory value,
 * `encode` produces the wire value.
 */
export interface Codec<T> {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  encode(value: T): unknown
}

/** Wire key paired with the codec of its value. */
export type Field<T> = readonly [wireKey: string, codec: Codec<T>]

export type Shape<T> = { readonly [K in keyof Required<T>]: Field<T[K]> }

export function scalar<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Codec<T> {
  return { schema, encode: (value) => value }
}

/**
 * Optional wire values: `null` and a missing key both decode to `undefined`.
 * Records drop `undefined` values on encode, so the key is omitted.
 */
export function optional<T>(codec: Codec<T>): Codec<T | undefined> {
  return {
    schema: codec.schema.nullish().transform((value) => value ?? undefined),
    encode: (value) => (value === undefined ? undefined : codec.encode(value)),
  }
}

export function list<T>(codec: Codec<T>): Codec<readonly T[]> {
  return {
    schema: z.array(codec.schema),
    encode: (values) => values.map((value) => codec.encode(value)),
  }
}

/** Defers codec lookup so recursive records (comment replies) can refer to themselves. */
export function lazy<T>(get: () => Codec<T>): Codec<T> {
  return {
    schema: z.lazy(() => get().schema),
    encode: (value) => get().encode(value),
  }
}

/**
 * Builds a record codec from a declared field table.
 *
 * @example
 * ```typescript
 * const pointCodec = record<Point>({
 *   x: ["pos_x", scalar(z.number())],
 *   label: ["label", optional(scalar(z.string()))],
 * })
 * pointCodec.encode({ x: 1 }) // { pos_x: 1 }
 * ```
 */
export function record<T extends object>(shape: Shape<T>): Codec<T> {
  const fields = Object.entries(shape) as [string, Field<unknown>][]

  const wireShape: z.ZodRawShape = {}
  for (const [, [wireKey, codec]] of fields) {
    wireShape[wireKey] = codec.schema
  }

  const schema = z.object(wireShape).transform((wire) => {
    const out: Record<string, unknown> = {}
    for (const [prop, [wireKey]] of fields) {
      const value = wire[wireKey]
      if (value !== undefined) out[prop] = value
    }
    return out as T
  })

  return {
    schema,
    encode: (value) => {
      const source = value as Record<string, unknown>
      const out: Record<string, unknown> = {}
      for (const [prop, [wireKey, codec]] of fields) {
        const encoded = codec.encode(source[prop])
        if (encoded !== undefined) out[wireKey] = encoded
      }
      return out
    },
  }
}

export function decode<T>(codec: Codec<T>, input: unknown): T {
  return codec.schema.parse(input)
}

const str = scalar(z.string())
const int = scalar(z.number().int())
const num = scalar(z.number())
const bool = scalar(z.boolean())
const optStr = optional(str)

export const mediaTypeCodec = scalar(z.enum(["image", "video", "gif", "audio"]))

export const visibilityCodec = scalar(z.enum(["public", "followers", "friends", "private"]))

export const messageTypeCodec = scalar(
  z.enum(["text", "image", "video", "audio", "file", "location", "sticker"])
)

export const notificationTypeCodec = scalar(
  z.enum(["like", "comment", "follow", "mention", "share", "message", "story"])
)

export const userProfileCodec: Codec<Sync.UserProfile> = record<Sync.UserProfile>({
  id: ["id", str],
  username: ["username", str],
  email: ["email", str],
  fullName: ["full_name", str],
  bio: ["bio", optStr],
  profileImageUrl: ["profile_image_url", optStr],
  coverImageUrl: ["cover_image_url", optStr],
  followerCount: ["follower_count", int],
  followingCount: ["following_count", int],
  postCount: ["post_count", int],
  isVerified: ["is_verified", bool],
  isPrivate: ["is_private", bool],
  location: ["location", optStr],
  website: ["website", optStr],
  dateOfBirth: ["date_of_birth", optStr],
  joinedDate: ["joined_date", str],
  lastActiveDate: ["last_active_date", str],
})

export const mediaItemCodec: Codec<Sync.MediaItem> = record<Sync.MediaItem>({
  id: ["id", str],
  type: ["type", mediaTypeCodec],
  url: ["url", str],
  thumbnailUrl: ["thumbnail_url", optStr],
  width: ["width", int],
  height: ["height", int],
  duration: ["duration", optional(num)],
  size: ["size", int],
  altText: ["alt_text", optStr],
})

export const locationDataCodec: Codec<Sync.LocationData> = record<Sync.LocationData>({
  name: ["name", str],
  address: ["address", str],
  latitude: ["latitude", num],
  longitude: ["longitude", num],
  placeId: ["place_id", optStr],
})

export const postCodec: Codec<Sync.Post> = record<Sync.Post>({
  id: ["id", str],
  authorId: ["author_id", str],
  author: ["author", userProfileCodec],
  content: ["content", str],
  mediaItems: ["media_items", list(mediaItemCodec)],
  hashtags: ["hashtags", list(str)],
  mentions: ["mentions", list(str)],
  location: ["location", optional(locationDataCodec)],
  likeCount: ["like_count", int],
  commentCount: ["comment_count", int],
  shareCount: ["share_count", int],
  isLiked: ["is_liked", bool],
  isBookmarked: ["is_bookmarked", bool],
  visibility: ["visibility", visibilityCodec],
  createdAt: ["created_at", str],
  updatedAt: ["updated_at", str],
})

export const commentCodec: Codec<Sync.Comment> = record<Sync.Comment>({
  id: ["id", str],
  postId: ["post_id", str],
  authorId: ["author_id", str],
  author: ["author", userProfileCodec],
  content: ["content", str],
  parentCommentId: ["parent_comment_id", optStr],
  replies: ["replies", optional(list(lazy(() => commentCodec)))],
  likeCount: ["like_count", int],
  isLiked: ["is_liked", bool],
  createdAt: ["created_at", str],
  updatedAt: ["updated_at", str],
})

export const storyCodec: Codec<Sync.Story> = record<Sync.Story>({
  id: ["id", str],
  authorId: ["author_id", str],
  author: ["author", userProfileCodec],
  mediaItem: ["media_item", mediaItemCodec],
  text: ["text", optStr],
  backgroundColor: ["background_color", optStr],
  viewCount: ["view_count", int],
  isViewed: ["is_viewed", bool],
  expiresAt: ["expires_at", str],
  createdAt: ["created_at", str],
})

export const chatMessageCodec: Codec<Sync.ChatMessage> = record<Sync.ChatMessage>({
  id: ["id", str],
  conversationId: ["conversation_id", str],
  senderId: ["sender_id", str],
  sender: ["sender", userProfileCodec],
  content: ["content", str],
  messageType: ["message_type", messageTypeCodec],
  mediaItem: ["media_item", optional(mediaItemCodec)],
  replyToMessageId: ["reply_to_message_id", optStr],
  isRead: ["is_read", bool],
  isDelivered: ["is_delivered", bool],
  createdAt: ["created_at", str],
  updatedAt: ["updated_at", str],
})

export const conversationCodec: Codec<Sync.Conversation> = record<Sync.Conversation>({
  id: ["id", str],
  participants: ["participants", list(userProfileCodec)],
  lastMessage: ["last_message", optional(chatMessageCodec)],
  unreadCount: ["unread_count", int],
  isGroup: ["is_group", bool],
  groupName: ["group_name", optStr],
  groupImageUrl: ["group_image_url", optStr],
  createdAt: ["created_at", str],
  updatedAt: ["updated_at", str],
})

export const notificationItemCodec: Codec<Sync.NotificationItem> = record<Sync.NotificationItem>({
  id: ["id", str],
  type: ["type", notificationTypeCodec],
  title: ["title", str],
  message: ["message", str],
  actionUserId: ["action_user_id", optStr],
  actionUser: ["action_user", optional(userProfileCodec)],
  relatedPostId: ["related_post_id", optStr],
  relatedPost: ["related_post", optional(postCodec)],
  isRead: ["is_read", bool],
  createdAt: ["created_at", str],
})

export const createPostRequestCodec: Codec<Sync.CreatePostRequest> = record<Sync.CreatePostRequest>({
  content: ["content", str],
  mediaItems: ["media_items", list(mediaItemCodec)],
  visibility: ["visibility", visibilityCodec],
  location: ["location", optional(locationDataCodec)],
})

export const createCommentRequestCodec: Codec<Sync.CreateCommentRequest> =
  record<Sync.CreateCommentRequest>({
    content: ["content", str],
    parentCommentId: ["parent_comment_id", optStr],
  })

export const createStoryRequestCodec: Codec<Sync.CreateStoryRequest> = record<Sync.CreateStoryRequest>({
  mediaItem: ["media_item", mediaItemCodec],
  text: ["text", optStr],
  backgroundColor: ["background_color", optStr],
})
