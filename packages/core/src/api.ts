import { atom } from "@pumped-fn/lite"
import { syncConfigAtom } from "./config"
import { jsonBody, transportAtom, type Transport } from "./transport"
import type { Sync } from "./types"
import {
  commentCodec,
  createCommentRequestCodec,
  createPostRequestCodec,
  createStoryRequestCodec,
  list,
  postCodec,
  storyCodec,
  userProfileCodec,
} from "./wire"

type Result<T> = Transport.Result<T>

/** Typed endpoints of the social backend. Pages are 1-based. */
export interface SocialApi {
  fetchUserProfile(userId: string): Promise<Result<Sync.UserProfile>>
  updateUserProfile(profile: Sync.UserProfile): Promise<Result<Sync.UserProfile>>
  searchUsers(query: string, page?: number, limit?: number): Promise<Result<readonly Sync.UserProfile[]>>
  fetchFeed(page?: number, limit?: number): Promise<Result<readonly Sync.Post[]>>
  fetchPost(postId: string): Promise<Result<Sync.Post>>
  createPost(request: Sync.CreatePostRequest): Promise<Result<Sync.Post>>
  deletePost(postId: string): Promise<Result<void>>
  likePost(postId: string): Promise<Result<void>>
  unlikePost(postId: string): Promise<Result<void>>
  fetchComments(postId: string, page?: number, limit?: number): Promise<Result<readonly Sync.Comment[]>>
  createComment(postId: string, request: Sync.CreateCommentRequest): Promise<Result<Sync.Comment>>
  fetchStories(page?: number, limit?: number): Promise<Result<readonly Sync.Story[]>>
  createStory(request: Sync.CreateStoryRequest): Promise<Result<Sync.Story>>
}

const users = list(userProfileCodec)
const posts = list(postCodec)
const comments = list(commentCodec)
const stories = list(storyCodec)

const segment = (id: string) => encodeURIComponent(id)

export function createSocialApi(transport: Transport.Client, defaultLimit = 20): SocialApi {
  const paging = (page: number, limit: number): Transport.Query => [
    ["page", page],
    ["limit", limit],
  ]

  return {
    fetchUserProfile: (userId) =>
      transport.request("GET", `/users/${segment(userId)}`, { codec: userProfileCodec }),

    updateUserProfile: (profile) =>
      transport.request("PUT", `/users/${segment(profile.id)}`, {
        body: jsonBody(userProfileCodec, profile),
        codec: userProfileCodec,
      }),

    searchUsers: (query, page = 1, limit = defaultLimit) =>
      transport.request("GET", "/users/search", {
        query: [["q", query], ...paging(page, limit)],
        codec: users,
      }),

    fetchFeed: (page = 1, limit = defaultLimit) =>
      transport.request("GET", "/posts/feed", { query: paging(page, limit), codec: posts }),

    fetchPost: (postId) => transport.request("GET", `/posts/${segment(postId)}`, { codec: postCodec }),

    createPost: (request) =>
      transport.request("POST", "/posts", {
        body: jsonBody(createPostRequestCodec, request),
        codec: postCodec,
      }),

    deletePost: (postId) => transport.request("DELETE", `/posts/${segment(postId)}`),

    likePost: (postId) => transport.request("POST", `/posts/${segment(postId)}/like`),

    unlikePost: (postId) => transport.request("DELETE", `/posts/${segment(postId)}/like`),

    fetchComments: (postId, page = 1, limit = defaultLimit) =>
      transport.request("GET", `/posts/${segment(postId)}/comments`, {
        query: paging(page, limit),
        codec: comments,
      }),

    createComment: (postId, request) =>
      transport.request("POST", `/posts/${segment(postId)}/comments`, {
        body: jsonBody(createCommentRequestCodec, request),
        codec: commentCodec,
      }),

    fetchStories: (page = 1, limit = defaultLimit) =>
      transport.request("GET", "/stories", { query: paging(page, limit), codec: stories }),

    createStory: (request) =>
      transport.request("POST", "/stories", {
        body: jsonBody(createStoryRequestCodec, request),
        codec: storyCodec,
      }),
  }
}

export const socialApiAtom = atom({
  deps: { transport: transportAtom, config: syncConfigAtom },
  factory: (_ctx, { transport, config }) => createSocialApi(transport, config.pageSize),
})
