import { atom } from "@pumped-fn/lite"
import type { Logger } from "pino"
import { socialCacheAtom, type SocialCache } from "./cache"
import { loggerAtom } from "./config"
import { transportAtom, type Transport } from "./transport"
import type { Sync } from "./types"

export interface ProbedImage extends Sync.Image {
  readonly format: "png" | "gif" | "jpeg"
  readonly bytes: Uint8Array
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  return prefix.every((byte, i) => bytes[i] === byte)
}

function jpegSize(bytes: Uint8Array): { width: number; height: number } | undefined {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let offset = 2
  while (offset + 9 < bytes.length) {
    if (bytes[offset] !== 0xff) return undefined
    const marker = bytes[offset + 1] ?? 0
    // SOF0..SOF15 except DHT (C4), JPG (C8) and DAC (CC)
    if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
      return { height: view.getUint16(offset + 5), width: view.getUint16(offset + 7) }
    }
    offset += 2 + view.getUint16(offset + 2)
  }
  return undefined
}

/**
 * Reads dimensions from PNG, GIF and JPEG headers without decoding pixels.
 * Used as the image decoder when the host does not supply one.
 */
export function probeImage(bytes: Uint8Array): ProbedImage | undefined {
  if (bytes.length >= 24 && startsWith(bytes, PNG_SIGNATURE)) {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    return { format: "png", width: view.getUint32(16), height: view.getUint32(20), bytes }
  }
  if (bytes.length >= 10 && startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    return { format: "gif", width: view.getUint16(6, true), height: view.getUint16(8, true), bytes }
  }
  if (bytes.length >= 4 && startsWith(bytes, [0xff, 0xd8])) {
    const size = jpegSize(bytes)
    return size ? { format: "jpeg", ...size, bytes } : undefined
  }
  return undefined
}

export const imageDecoderAtom = atom({
  factory: (): Sync.ImageDecoder => ({ decode: probeImage }),
})

export class ImageLoader {
  constructor(
    private readonly transport: Transport.Client,
    private readonly decoder: Sync.ImageDecoder,
    private readonly cache: SocialCache,
    private readonly logger: Logger
  ) {}

  /** Cached image for `url`, else download, decode and cache it. Failures yield `undefined`. */
  async loadImage(url: string): Promise<Sync.Image | undefined> {
    const cached = this.cache.getCachedImage(url)
    if (cached) return cached

    const result = await this.transport.download(url)
    if (!result.success) {
      this.logger.warn({ url, code: result.error.code, statusCode: result.error.statusCode }, "image download failed")
      return undefined
    }

    const image = this.decoder.decode(result.data)
    if (!image) {
      this.logger.warn({ url, size: result.data.byteLength }, "image decode failed")
      return undefined
    }

    this.cache.cacheImage(url, image, result.data.byteLength)
    return image
  }
}

export const imageLoaderAtom = atom({
  deps: {
    transport: transportAtom,
    decoder: imageDecoderAtom,
    cache: socialCacheAtom,
    logger: loggerAtom,
  },
  factory: (_ctx, { transport, decoder, cache, logger }) =>
    new ImageLoader(transport, decoder, cache, logger.child({ component: "images" })),
})
