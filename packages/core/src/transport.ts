import { atom } from "@pumped-fn/lite"
import { syncConfigAtom } from "./config"
import { createStatusError, createTransportError, type TransportError } from "./errors"
import type { Sync } from "./types"
import type { Codec } from "./wire"

export namespace Transport {
  export type Method = "GET" | "POST" | "PUT" | "DELETE"

  /** Ordered query parameters; order is preserved in the built URL. */
  export type Query = ReadonlyArray<readonly [name: string, value: string | number | boolean]>

  export type Result<T> =
    | { success: true; data: T }
    | { success: false; error: TransportError }

  export interface Body {
    readonly payload: () => unknown
  }

  export interface RequestOptions {
    query?: Query
    body?: Body
  }

  export interface RawPayload<T> {
    bytes: Uint8Array
    contentType: string
    codec: Codec<T>
  }

  export interface Client {
    request<T>(method: Method, path: string, options: RequestOptions & { codec: Codec<T> }): Promise<Result<T>>
    request(method: Method, path: string, options?: RequestOptions): Promise<Result<void>>
    /** Fetches an absolute URL and returns the raw body. */
    download(url: string): Promise<Result<Uint8Array>>
    send<T>(method: Method, path: string, payload: RawPayload<T>): Promise<Result<T>>
  }
}

export function ok<T>(data: T): Transport.Result<T> {
  return { success: true, data }
}

export function fail<T = never>(error: TransportError): Transport.Result<T> {
  return { success: false, error }
}

/**
 * Wraps a value and its codec as a JSON request body. Encoding is deferred to
 * the transport so that a failure surfaces as `EncodingError`.
 */
export function jsonBody<T>(codec: Codec<T>, value: T): Transport.Body {
  return { payload: () => codec.encode(value) }
}

function serialize(body: Transport.Body): Transport.Result<string> {
  try {
    const text = JSON.stringify(body.payload())
    if (text === undefined) {
      return fail(createTransportError("EncodingError", "body has no JSON representation"))
    }
    return ok(text)
  } catch (error) {
    return fail(createTransportError("EncodingError", error))
  }
}

async function decodeJson<T>(response: Response, codec: Codec<T>): Promise<Transport.Result<T>> {
  try {
    const json: unknown = await response.json()
    return ok(codec.schema.parse(json))
  } catch (error) {
    return fail(createTransportError("DecodingError", error))
  }
}

class HttpTransport implements Transport.Client {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchFn: Sync.Fetch
  ) {}

  request<T>(
    method: Transport.Method,
    path: string,
    options: Transport.RequestOptions & { codec: Codec<T> }
  ): Promise<Transport.Result<T>>
  request(method: Transport.Method, path: string, options?: Transport.RequestOptions): Promise<Transport.Result<void>>
  async request<T>(
    method: Transport.Method,
    path: string,
    options: Transport.RequestOptions & { codec?: Codec<T> } = {}
  ): Promise<Transport.Result<T | void>> {
    const url = this.buildUrl(path, options.query)
    if (!url.success) return url

    const headers: Record<string, string> = { Accept: "application/json" }
    let body: string | undefined
    if (options.body) {
      const serialized = serialize(options.body)
      if (!serialized.success) return serialized
      body = serialized.data
      headers["Content-Type"] = "application/json"
    }

    const response = await this.perform(url.data, { method, headers, body })
    if (!response.success) return response

    if (!options.codec) return ok(undefined)
    return decodeJson(response.data, options.codec)
  }

  async download(url: string): Promise<Transport.Result<Uint8Array>> {
    try {
      new URL(url)
    } catch (error) {
      return fail(createTransportError("InvalidURL", error))
    }

    const response = await this.perform(url, { method: "GET" })
    if (!response.success) return response

    try {
      return ok(new Uint8Array(await response.data.arrayBuffer()))
    } catch (error) {
      return fail(createTransportError("NetworkUnavailable", error))
    }
  }

  async send<T>(
    method: Transport.Method,
    path: string,
    payload: Transport.RawPayload<T>
  ): Promise<Transport.Result<T>> {
    const url = this.buildUrl(path)
    if (!url.success) return url

    const response = await this.perform(url.data, {
      method,
      headers: { Accept: "application/json", "Content-Type": payload.contentType },
      body: payload.bytes,
    })
    if (!response.success) return response

    return decodeJson(response.data, payload.codec)
  }

  private buildUrl(path: string, query?: Transport.Query): Transport.Result<string> {
    let url: URL
    try {
      url = new URL(`${this.baseUrl}${path}`)
    } catch (error) {
      return fail(createTransportError("InvalidURL", error))
    }
    for (const [name, value] of query ?? []) {
      url.searchParams.append(name, String(value))
    }
    return ok(url.toString())
  }

  private async perform(url: string, init: RequestInit): Promise<Transport.Result<Response>> {
    let response: Response
    try {
      response = await this.fetchFn(url, init)
    } catch (error) {
      return fail(createTransportError("NetworkUnavailable", error))
    }
    if (response.status < 200 || response.status > 299) {
      return fail(createStatusError(response.status))
    }
    return ok(response)
  }
}

/**
 * Creates a stateless HTTP transport rooted at `baseUrl`.
 *
 * @example
 * ```typescript
 * const transport = createTransport("https://api.example.com", fetch)
 * const result = await transport.request("GET", "/users/42", { codec: userProfileCodec })
 * if (result.success) console.log(result.data.fullName)
 * ```
 */
export function createTransport(baseUrl: string, fetchFn: Sync.Fetch): Transport.Client {
  return new HttpTransport(baseUrl, fetchFn)
}

export const fetchAtom = atom({
  factory: (): Sync.Fetch => (input, init) => fetch(input, init),
})

export const transportAtom = atom({
  deps: { config: syncConfigAtom, fetch: fetchAtom },
  factory: (_ctx, { config, fetch }) => createTransport(config.baseUrl, fetch),
})
