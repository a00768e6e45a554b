import { describe, it, expect, vi } from "vitest"
import { UploadError } from "../src/errors"
import { createTransport } from "../src/transport"
import type { Sync } from "../src/types"
import { encodeMultipartImage, MediaUploader } from "../src/upload"
import { BASE_URL, json, silentLogger, wireMedia } from "./fixtures"

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes)
const imageBytes = new TextEncoder().encode("JPEGDATA")

function uploader(respond: () => Response | Promise<Response>) {
  const fetch = vi.fn<Sync.Fetch>(async () => respond())
  return { fetch, uploader: new MediaUploader(createTransport(BASE_URL, fetch), silentLogger()) }
}

describe("encodeMultipartImage", () => {
  it("lays out a single image part", () => {
    const body = encodeMultipartImage(imageBytes, "b0undary")

    expect(body.contentType).toBe("multipart/form-data; boundary=b0undary")
    expect(text(body.bytes)).toBe(
      "--b0undary\r\n" +
        'Content-Disposition: form-data; name="image"; filename="image.jpg"\r\n' +
        "Content-Type: image/jpeg\r\n\r\n" +
        "JPEGDATA" +
        "\r\n--b0undary--\r\n"
    )
  })

  it("picks a fresh boundary per body", () => {
    expect(encodeMultipartImage(imageBytes).boundary).not.toBe(encodeMultipartImage(imageBytes).boundary)
  })
})

describe("MediaUploader", () => {
  it("posts the multipart body and decodes the media item", async () => {
    const { fetch, uploader: upload } = uploader(() => json(wireMedia("m1")))

    const result = await upload.uploadImage(imageBytes)

    expect(result.success && result.data).toMatchObject({ id: "m1", type: "image", width: 640 })
    const call = fetch.mock.calls[0]
    const init = call?.[1]
    expect(call?.[0]).toBe("https://api.test.local/media/upload")
    expect(init?.method).toBe("POST")
    const headers = new Headers(init?.headers)
    expect(headers.get("Content-Type")).toMatch(/^multipart\/form-data; boundary=[0-9a-f-]{36}$/)
    expect(init?.body).toBeInstanceOf(Uint8Array)
  })

  it("rejects empty data without a request", async () => {
    const { fetch, uploader: upload } = uploader(() => json(wireMedia("m1")))

    const result = await upload.uploadImage(new Uint8Array())

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(UploadError)
      expect(result.error.code).toBe("InvalidImageData")
    }
    expect(fetch).not.toHaveBeenCalled()
  })

  it("reports a server error as UploadFailed with the transport error as cause", async () => {
    const { uploader: upload } = uploader(() => json({ message: "too large" }, 413))

    const result = await upload.uploadImage(imageBytes)

    expect(result).toMatchObject({ success: false, error: { code: "UploadFailed", message: "Failed to upload media" } })
    if (!result.success) expect(result.error.cause).toMatchObject({ code: "InvalidResponse", statusCode: 413 })
  })

  it("reports an unreadable response as DecodingError", async () => {
    const { uploader: upload } = uploader(() => json({ id: "m1" }))

    const result = await upload.uploadImage(imageBytes)

    expect(result).toMatchObject({ success: false, error: { code: "DecodingError" } })
  })
})
