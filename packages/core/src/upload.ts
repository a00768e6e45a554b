import { atom } from "@pumped-fn/lite"
import { randomUUID } from "node:crypto"
import type { Logger } from "pino"
import { loggerAtom } from "./config"
import { UploadError } from "./errors"
import { transportAtom, type Transport } from "./transport"
import type { Sync } from "./types"
import { mediaItemCodec } from "./wire"

export type UploadResult =
  | { success: true; data: Sync.MediaItem }
  | { success: false; error: UploadError }

export interface MultipartBody {
  boundary: string
  contentType: string
  bytes: Uint8Array
}

/**
 * Single-part `multipart/form-data` body carrying a JPEG under the field
 * name `image`.
 */
export function encodeMultipartImage(imageData: Uint8Array, boundary: string = randomUUID()): MultipartBody {
  const encoder = new TextEncoder()
  const head = encoder.encode(
    `--${boundary}\r\n` +
      `Content-Disposition: form-data; name="image"; filename="image.jpg"\r\n` +
      `Content-Type: image/jpeg\r\n\r\n`
  )
  const tail = encoder.encode(`\r\n--${boundary}--\r\n`)

  const bytes = new Uint8Array(head.length + imageData.length + tail.length)
  bytes.set(head, 0)
  bytes.set(imageData, head.length)
  bytes.set(tail, head.length + imageData.length)

  return { boundary, contentType: `multipart/form-data; boundary=${boundary}`, bytes }
}

export class MediaUploader {
  constructor(
    private readonly transport: Transport.Client,
    private readonly logger: Logger
  ) {}

  async uploadImage(imageData: Uint8Array): Promise<UploadResult> {
    if (imageData.byteLength === 0) {
      return { success: false, error: new UploadError("InvalidImageData", "Invalid image data") }
    }

    const body = encodeMultipartImage(imageData)
    const result = await this.transport.send("POST", "/media/upload", {
      bytes: body.bytes,
      contentType: body.contentType,
      codec: mediaItemCodec,
    })
    if (result.success) return result

    const error =
      result.error.code === "DecodingError"
        ? new UploadError("DecodingError", "Failed to decode upload response", { cause: result.error })
        : new UploadError("UploadFailed", "Failed to upload media", { cause: result.error })
    this.logger.warn({ code: error.code, cause: result.error.code, size: imageData.byteLength }, error.message)
    return { success: false, error }
  }
}

export const mediaUploaderAtom = atom({
  deps: { transport: transportAtom, logger: loggerAtom },
  factory: (_ctx, { transport, logger }) => new MediaUploader(transport, logger.child({ component: "upload" })),
})
