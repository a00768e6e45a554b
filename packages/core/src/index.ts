export type { MaybePromise, Sync } from "./types"

export {
  TransportError,
  UploadError,
  ConfigError,
  statusErrorCode,
  createStatusError,
  createTransportError,
} from "./errors"

export {
  type Codec,
  type Field,
  type Shape,
  scalar,
  optional,
  list,
  lazy,
  record,
  decode,
  mediaTypeCodec,
  visibilityCodec,
  messageTypeCodec,
  notificationTypeCodec,
  userProfileCodec,
  mediaItemCodec,
  locationDataCodec,
  postCodec,
  commentCodec,
  storyCodec,
  chatMessageCodec,
  conversationCodec,
  notificationItemCodec,
  createPostRequestCodec,
  createCommentRequestCodec,
  createStoryRequestCodec,
} from "./wire"

export {
  type LogLevel,
  type CacheLimits,
  type SyncConfig,
  syncConfig,
  syncConfigAtom,
  loggerAtom,
} from "./config"

export { type Transport, ok, fail, jsonBody, createTransport, fetchAtom, transportAtom } from "./transport"
export { type SocialApi, createSocialApi, socialApiAtom } from "./api"

export { LruCache, SocialCache, socialCacheAtom } from "./cache"
export { Store } from "./store"
export { type PageFetcher, type CollectionOptions, PagedCollection, emptyPageState } from "./collection"

export {
  MemorySettingsStore,
  settingsStoreAtom,
  unavailableLocation,
  locationProviderAtom,
  isLocationAuthorized,
} from "./collaborators"

export { type ProbedImage, probeImage, imageDecoderAtom, ImageLoader, imageLoaderAtom } from "./image"
export { type UploadResult, type MultipartBody, encodeMultipartImage, MediaUploader, mediaUploaderAtom } from "./upload"

export {
  type CreatePostInput,
  type PostManagerDeps,
  FEED_CACHE_KEY,
  toggledLike,
  PostManager,
  postManagerAtom,
} from "./posts"
export { StoryManager, storyManagerAtom } from "./stories"
export { CommentManager, commentManagerAtom } from "./comments"
export { type UserSearch, type UserState, type UserManagerOptions, UserManager, userManagerAtom } from "./users"
export { type NotificationState, NotificationManager, notificationManagerAtom } from "./notifications"
