import type { Payload } from "./payload"
import type { Severity } from "./severity"

export type Labels = Record<string, string>

/**
 * HTTP request descriptor in the Cloud Logging `HttpRequest` shape.
 * @see https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#HttpRequest
 */
export type HttpRequest = {
  requestMethod?: string
  requestUrl?: string
  status?: number
  userAgent?: string
  remoteIp?: string
  referer?: string
  protocol?: string
  requestSize?: number
  responseSize?: number
  /** Request latency in seconds, e.g. `0.042` */
  latencySeconds?: number
}

/**
 * A single entry submitted to the remote sink.
 * Unstructured calls carry the formatted string, structured calls the payload object.
 */
export type RemoteEntry = {
  severity: Severity
  payload: string | Payload
  labels: Labels
  httpRequest?: HttpRequest
}

/**
 * Destination for remote log entries.
 * Implementations own buffering, transport and retries.
 */
export interface RemoteSink {
  /** Submits an entry. Never throws; failures surface from {@link flush}. */
  write(entry: RemoteEntry): void
  /** Resolves once every submitted entry has been handed off; rejects on failure. */
  flush(): Promise<void>
}
