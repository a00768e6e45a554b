import { atom, tag, tags } from "@pumped-fn/lite"
import { pino, type Logger } from "pino"
import { z } from "zod"
import { ConfigError } from "./errors"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface CacheLimits {
  maxEntries: number
  maxTotalCost: number
}

const MiB = 1024 * 1024

/**
 * Scope-level configuration. Set values when creating the scope:
 *
 * @example
 * ```typescript
 * const scope = createScope({
 *   tags: [syncConfig.baseUrl("https://staging.example.com"), syncConfig.pageSize(50)],
 * })
 * ```
 */
export const syncConfig = {
  baseUrl: tag<string>({ label: "sync.baseUrl", default: "https://api.socialmedia.com" }),
  pageSize: tag<number>({ label: "sync.pageSize", default: 20 }),
  logLevel: tag<LogLevel>({ label: "sync.logLevel", default: "info" }),
  imageCache: tag<CacheLimits>({
    label: "sync.imageCache",
    default: { maxEntries: 200, maxTotalCost: 100 * MiB },
  }),
  postCache: tag<CacheLimits>({
    label: "sync.postCache",
    default: { maxEntries: 100, maxTotalCost: 50 * MiB },
  }),
  currentUserKey: tag<string>({ label: "sync.currentUserKey", default: "current_user_id" }),
}

const limitsSchema = z.object({
  maxEntries: z.number().int().positive(),
  maxTotalCost: z.number().int().positive(),
})

const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  pageSize: z.number().int().positive(),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  imageCache: limitsSchema,
  postCache: limitsSchema,
  currentUserKey: z.string().min(1),
})

export type SyncConfig = z.infer<typeof configSchema>

function isConfigKey(key: unknown): key is keyof typeof syncConfig {
  return typeof key === "string" && key in syncConfig
}

export const syncConfigAtom = atom({
  deps: {
    baseUrl: tags.required(syncConfig.baseUrl),
    pageSize: tags.required(syncConfig.pageSize),
    logLevel: tags.required(syncConfig.logLevel),
    imageCache: tags.required(syncConfig.imageCache),
    postCache: tags.required(syncConfig.postCache),
    currentUserKey: tags.required(syncConfig.currentUserKey),
  },
  factory: (_ctx, deps): SyncConfig => {
    const result = configSchema.safeParse(deps)
    if (!result.success) {
      const key = result.error.issues[0]?.path[0]
      const label = isConfigKey(key) ? syncConfig[key].label : "sync"
      throw new ConfigError(`Invalid value for "${label}"`, label, result.error)
    }
    return result.data
  },
})

export const loggerAtom = atom({
  deps: { config: syncConfigAtom },
  factory: (_ctx, { config }): Logger => pino({ name: "social-sync", level: config.logLevel }),
})
