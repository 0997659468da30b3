import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { Some } from "ts-results"
import { createLogger, DualLogger } from "./logger"
import {
  loggingMiddleware,
  MiddlewareRequest,
  MiddlewareResponse,
  REQUEST_LOGGER_KEY,
  toHttpRequest,
} from "./middleware"
import { captureStream, MemorySink } from "./test-utils"

function fakeRequest(path: string, headers: Record<string, string> = {}): MiddlewareRequest {
  return {
    get: (name: string) => headers[name.toLowerCase()],
    method: "GET",
    originalUrl: `${path}?page=2`,
    path,
    ip: "10.0.0.7",
  }
}

class FakeResponse implements MiddlewareResponse {
  private onFinish?: () => void

  constructor(
    public statusCode: number,
    private readonly contentLength?: string,
  ) {}

  on(_event: "finish", callback: () => void): this {
    this.onFinish = callback
    return this
  }

  get(headerName: string): string | undefined {
    return headerName === "content-length" ? this.contentLength : undefined
  }

  finish(): void {
    this.onFinish?.()
  }
}

describe("toHttpRequest", () => {
  it("maps request properties and headers", () => {
    const req = fakeRequest("/invoices", {
      "user-agent": "curl/8.0",
      referer: "https://example.test/",
      "x-forwarded-proto": "https",
    })
    expect(toHttpRequest(req)).toEqual({
      requestMethod: "GET",
      requestUrl: "/invoices?page=2",
      userAgent: "curl/8.0",
      remoteIp: "10.0.0.7",
      referer: "https://example.test/",
      protocol: "https",
    })
  })

  it("falls back to the socket address and HTTP/1.1", () => {
    const req: MiddlewareRequest = { ...fakeRequest("/"), ip: undefined, socket: { remoteAddress: "10.0.0.9" } }
    const httpRequest = toHttpRequest(req)
    expect(httpRequest.remoteIp).toBe("10.0.0.9")
    expect(httpRequest.protocol).toBe("HTTP/1.1")
  })
})

describe("loggingMiddleware", () => {
  let sink: MemorySink
  let logger: DualLogger

  beforeEach(() => {
    sink = new MemorySink()
    logger = createLogger({ app: "billing" }, { stream: captureStream().stream, sink: Some(sink) })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("attaches a request-scoped logger and calls next", () => {
    const req = fakeRequest("/invoices")
    const next = vi.fn()

    loggingMiddleware({ logger })(req, new FakeResponse(200), next)

    expect(next).toHaveBeenCalledOnce()
    expect(req[REQUEST_LOGGER_KEY]?.getRequest()).toEqual(toHttpRequest(req))
    expect(sink.entries).toEqual([])
  })

  it("logs completion with status, size and latency", () => {
    vi.spyOn(Date, "now").mockReturnValueOnce(1_000).mockReturnValueOnce(1_250)
    const req = fakeRequest("/invoices")
    const res = new FakeResponse(503, "120")

    loggingMiddleware({ logger })(req, res, () => undefined)
    res.finish()

    expect(sink.entries).toHaveLength(1)
    const [entry] = sink.entries
    expect(entry.severity).toBe("error")
    expect(entry.payload).toEqual({ message: "request completed", status: 503, latencyMs: 250 })
    expect(entry.httpRequest).toMatchObject({
      requestMethod: "GET",
      requestUrl: "/invoices?page=2",
      status: 503,
      responseSize: 120,
      latencySeconds: 0.25,
    })
  })

  it("uses warning for client errors", () => {
    const res = new FakeResponse(404)
    loggingMiddleware({ logger })(fakeRequest("/missing"), res, () => undefined)
    res.finish()
    expect(sink.entries[0].severity).toBe("warning")
    expect(sink.entries[0].httpRequest?.responseSize).toBeUndefined()
  })

  it("leaves responseSize unset when content-length is not a number", () => {
    const res = new FakeResponse(200, "chunked")
    loggingMiddleware({ logger })(fakeRequest("/invoices"), res, () => undefined)
    res.finish()
    expect(sink.entries[0].httpRequest).not.toHaveProperty("responseSize", NaN)
    expect(sink.entries[0].httpRequest?.responseSize).toBeUndefined()
  })

  it("skips health checks", () => {
    const res = new FakeResponse(200)
    const req = fakeRequest("/healthz")
    loggingMiddleware({ logger })(req, res, () => undefined)
    res.finish()
    expect(sink.entries).toEqual([])
    expect(req.log).toBeInstanceOf(DualLogger)
  })

  it("supports wildcard skip paths", () => {
    const res = new FakeResponse(200)
    loggingMiddleware({ logger, skipPaths: ["/internal/*"] })(fakeRequest("/internal/metrics"), res, () => undefined)
    res.finish()
    expect(sink.entries).toEqual([])
  })
})
