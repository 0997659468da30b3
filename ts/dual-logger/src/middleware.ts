import { Socket } from "net"
import { createLogger, DualLogger } from "./logger"
import type { HttpRequest } from "./sink"

// Express compat layer
export interface MiddlewareRequest {
  get(headerName: string): string | undefined
  method: string
  originalUrl: string
  path: string
  ip?: string
  socket?: Pick<Socket, "remoteAddress">
  // Custom properties added by middleware
  log?: DualLogger
}

export interface MiddlewareResponse {
  on(event: "finish", callback: () => void): this
  statusCode: number
  get(headerName: string): string | undefined
}

export type NextFn = () => void

/**
 * Key used to store the logger instance on the request object.
 */
export const REQUEST_LOGGER_KEY = "log" as const

declare global {
  namespace Express {
    interface Request {
      /** Request-scoped logger carrying the HTTP request descriptor */
      log: DualLogger
    }
  }
}

export type LoggingMiddlewareConfig = {
  /**
   * Base logger. Request loggers are derived from it with `withRequest`.
   * If not provided, creates one with no common labels.
   */
  logger?: DualLogger

  /**
   * Whether to log response completion automatically.
   * @default true
   */
  logResponses?: boolean

  /**
   * Paths to skip logging entirely (e.g., health checks).
   * Supports exact matches and simple glob patterns with *.
   * @default ["/healthz", "/readyz", "/health", "/ready"]
   */
  skipPaths?: string[]
}

const DEFAULT_SKIP_PATHS = ["/healthz", "/readyz", "/health", "/ready"]

/**
 * Builds the Cloud Logging request descriptor for an incoming request.
 */
export function toHttpRequest(req: MiddlewareRequest): HttpRequest {
  return {
    requestMethod: req.method,
    requestUrl: req.originalUrl,
    userAgent: req.get("user-agent"),
    remoteIp: req.ip || req.socket?.remoteAddress,
    referer: req.get("referer"),
    protocol: req.get("x-forwarded-proto") || "HTTP/1.1",
  }
}

/**
 * Express middleware that attaches a request-scoped logger to `req.log`.
 * Remote entries written through it carry the request descriptor.
 *
 * @example
 * ```ts
 * const logger = createLogger({ app: "billing", module: "api" })
 * app.use(loggingMiddleware({ logger }))
 *
 * app.get("/invoices", (req, res) => {
 *   req.log.info("listing invoices", ["tenant", req.query.tenant])
 * })
 * ```
 */
export function loggingMiddleware(
  config: LoggingMiddlewareConfig = {},
): (req: MiddlewareRequest, res: MiddlewareResponse, next: NextFn) => void {
  const { logger = createLogger(), logResponses = true, skipPaths = DEFAULT_SKIP_PATHS } = config

  return (req: MiddlewareRequest, res: MiddlewareResponse, next: NextFn): void => {
    const startTime = Date.now()
    const httpRequest = toHttpRequest(req)
    const requestLogger = logger.withRequest(httpRequest)
    req[REQUEST_LOGGER_KEY] = requestLogger

    const shouldSkip = skipPaths.some((pattern) => matchPath(pattern, req.path))

    if (logResponses && !shouldSkip) {
      res.on("finish", () => {
        const duration = Date.now() - startTime
        const contentLength = parseInt(res.get("content-length") ?? "", 10)
        const completed = requestLogger.withRequest({
          ...httpRequest,
          status: res.statusCode,
          responseSize: Number.isNaN(contentLength) ? undefined : contentLength,
          latencySeconds: duration / 1000,
        })

        const severity = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warning" : "info"
        completed.log(severity, "request completed", ["status", res.statusCode], ["latencyMs", duration])
      })
    }

    next()
  }
}

/**
 * Simple path matching supporting exact matches and * wildcards.
 */
function matchPath(pattern: string, path: string): boolean {
  if (pattern === path) {
    return true
  }
  if (pattern.includes("*")) {
    const regex = new RegExp("^" + pattern.replace(/\*/g, ".*") + "$")
    return regex.test(path)
  }
  return false
}
