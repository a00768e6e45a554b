import type { TransportError } from "./errors"

export type MaybePromise<T> = T | Promise<T>

export namespace Sync {
  export type MediaType = "image" | "video" | "gif" | "audio"

  export type PostVisibility = "public" | "followers" | "friends" | "private"

  export type MessageType =
    | "text"
    | "image"
    | "video"
    | "audio"
    | "file"
    | "location"
    | "sticker"

  export type NotificationType =
    | "like"
    | "comment"
    | "follow"
    | "mention"
    | "share"
    | "message"
    | "story"

  /**
   * Anything the collections can hold. Identity is the `id`; records are never
   * patched in place, a changed record is a new object.
   */
  export interface Entity {
    readonly id: string
  }

  export interface UserProfile extends Entity {
    readonly username: string
    readonly email: string
    readonly fullName: string
    readonly bio?: string
    readonly profileImageUrl?: string
    readonly coverImageUrl?: string
    readonly followerCount: number
    readonly followingCount: number
    readonly postCount: number
    readonly isVerified: boolean
    readonly isPrivate: boolean
    readonly location?: string
    readonly website?: string
    readonly dateOfBirth?: string
    readonly joinedDate: string
    readonly lastActiveDate: string
  }

  export interface MediaItem extends Entity {
    readonly type: MediaType
    readonly url: string
    readonly thumbnailUrl?: string
    readonly width: number
    readonly height: number
    /** Seconds, for video and audio */
    readonly duration?: number
    readonly size: number
    readonly altText?: string
  }

  export interface LocationData {
    readonly name: string
    readonly address: string
    readonly latitude: number
    readonly longitude: number
    readonly placeId?: string
  }

  export interface Post extends Entity {
    readonly authorId: string
    readonly author: UserProfile
    readonly content: string
    readonly mediaItems: readonly MediaItem[]
    readonly hashtags: readonly string[]
    readonly mentions: readonly string[]
    readonly location?: LocationData
    readonly likeCount: number
    readonly commentCount: number
    readonly shareCount: number
    readonly isLiked: boolean
    readonly isBookmarked: boolean
    readonly visibility: PostVisibility
    readonly createdAt: string
    readonly updatedAt: string
  }

  export interface Comment extends Entity {
    readonly postId: string
    readonly authorId: string
    readonly author: UserProfile
    readonly content: string
    readonly parentCommentId?: string
    readonly replies?: readonly Comment[]
    readonly likeCount: number
    readonly isLiked: boolean
    readonly createdAt: string
    readonly updatedAt: string
  }

  export interface Story extends Entity {
    readonly authorId: string
    readonly author: UserProfile
    readonly mediaItem: MediaItem
    readonly text?: string
    readonly backgroundColor?: string
    readonly viewCount: number
    readonly isViewed: boolean
    readonly expiresAt: string
    readonly createdAt: string
  }

  export interface ChatMessage extends Entity {
    readonly conversationId: string
    readonly senderId: string
    readonly sender: UserProfile
    readonly content: string
    readonly messageType: MessageType
    readonly mediaItem?: MediaItem
    readonly replyToMessageId?: string
    readonly isRead: boolean
    readonly isDelivered: boolean
    readonly createdAt: string
    readonly updatedAt: string
  }

  export interface Conversation extends Entity {
    readonly participants: readonly UserProfile[]
    readonly lastMessage?: ChatMessage
    readonly unreadCount: number
    readonly isGroup: boolean
    readonly groupName?: string
    readonly groupImageUrl?: string
    readonly createdAt: string
    readonly updatedAt: string
  }

  export interface NotificationItem extends Entity {
    readonly type: NotificationType
    readonly title: string
    readonly message: string
    readonly actionUserId?: string
    readonly actionUser?: UserProfile
    readonly relatedPostId?: string
    readonly relatedPost?: Post
    readonly isRead: boolean
    readonly createdAt: string
  }

  export interface CreatePostRequest {
    readonly content: string
    readonly mediaItems: readonly MediaItem[]
    readonly visibility: PostVisibility
    readonly location?: LocationData
  }

  export interface CreateCommentRequest {
    readonly content: string
    readonly parentCommentId?: string
  }

  export interface CreateStoryRequest {
    readonly mediaItem: MediaItem
    readonly text?: string
    readonly backgroundColor?: string
  }

  /**
   * Published state of one paginated collection.
   * `isLoading` is true only while a fetch is outstanding; `error` holds the
   * failure of the most recent fetch and is cleared when the next one starts.
   */
  export interface PageState<T extends Entity> {
    readonly items: readonly T[]
    readonly currentPage: number
    readonly hasMore: boolean
    readonly isLoading: boolean
    readonly error?: TransportError
  }

  export type Listener = () => void

  /** Decoded, displayable image as produced by the host platform. */
  export interface Image {
    readonly width: number
    readonly height: number
  }

  export interface ImageDecoder {
    decode(bytes: Uint8Array): Image | undefined
  }

  export type AuthorizationStatus =
    | "notDetermined"
    | "restricted"
    | "denied"
    | "authorizedWhenInUse"
    | "authorizedAlways"

  export interface Coordinate {
    readonly latitude: number
    readonly longitude: number
  }

  export interface LocationProvider {
    readonly authorizationStatus: AuthorizationStatus
    lastKnownCoordinate(): Coordinate | undefined
    requestAuthorization(): void
  }

  export interface SettingsStore {
    getString(key: string): string | undefined
    getBoolean(key: string): boolean | undefined
    getNumber(key: string): number | undefined
    set(key: string, value: string | boolean | number): void
  }

  export type Fetch = (input: string, init?: RequestInit) => Promise<Response>
}
