export class TransportError extends Error {
  override readonly name = "TransportError"

  constructor(
    readonly code: TransportError.Code,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export namespace TransportError {
  export type Code =
    | "InvalidURL"
    | "InvalidResponse"
    | "DecodingError"
    | "EncodingError"
    | "NetworkUnavailable"
    | "Unauthorized"
    | "Forbidden"
    | "NotFound"
    | "ServerError"

  export type StatusCode = Extract<
    Code,
    "InvalidResponse" | "Unauthorized" | "Forbidden" | "NotFound" | "ServerError"
  >
}

const statusMessages: Record<TransportError.StatusCode, string> = {
  InvalidResponse: "Invalid response from server",
  Unauthorized: "Unauthorized access",
  Forbidden: "Access forbidden",
  NotFound: "Resource not found",
  ServerError: "Internal server error",
}

export function statusErrorCode(status: number): TransportError.StatusCode {
  if (status === 401) return "Unauthorized"
  if (status === 403) return "Forbidden"
  if (status === 404) return "NotFound"
  if (status >= 500 && status <= 599) return "ServerError"
  return "InvalidResponse"
}

export function createStatusError(status: number): TransportError {
  const code = statusErrorCode(status)
  return new TransportError(code, `${statusMessages[code]} (HTTP ${status})`, status)
}

export function createTransportError(
  code: Exclude<TransportError.Code, TransportError.StatusCode>,
  cause: unknown
): TransportError {
  const causeMsg = cause instanceof Error ? cause.message : String(cause)
  const prefix: Record<typeof code, string> = {
    InvalidURL: "Invalid URL",
    DecodingError: "Failed to decode response data",
    EncodingError: "Failed to encode request data",
    NetworkUnavailable: "Network is unavailable",
  }
  return new TransportError(code, `${prefix[code]}: ${causeMsg}`, undefined, { cause })
}

export class UploadError extends Error {
  override readonly name = "UploadError"

  constructor(
    readonly code: UploadError.Code,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export namespace UploadError {
  export type Code = "InvalidImageData" | "UploadFailed" | "DecodingError"
}

export class ConfigError extends Error {
  override readonly name = "ConfigError"

  constructor(
    message: string,
    readonly label: string,
    override readonly cause: unknown
  ) {
    super(message)
  }
}
