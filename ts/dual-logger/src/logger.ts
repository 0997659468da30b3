import { format } from "util"
import { None, Ok, Option, Result, Some } from "ts-results"
import winston from "winston"
import { buildCloudSink } from "./cloud-sink"
import { resolveCredentials } from "./credentials"
import { Field, formatPayload, serializePayload } from "./payload"
import { Severity, toLocalLevel } from "./severity"
import type { HttpRequest, Labels, RemoteSink } from "./sink"
import { catchToResult, toError } from "./utils/catch-to-result"

/**
 * Thrown (as a rejection) by the panic family after the entry has been logged.
 * Unlike fatal, the process keeps running and the caller may recover.
 */
export class PanicError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "PanicError"
  }
}

export type ExitFn = (code: number) => never

/**
 * Minimal printf-style logging surface.
 */
export interface StandardLogger {
  print(...args: unknown[]): void
  printf(template: string, ...args: unknown[]): void
  println(...args: unknown[]): void

  fatal(...args: unknown[]): Promise<never>
  fatalf(template: string, ...args: unknown[]): Promise<never>
  fatalln(...args: unknown[]): Promise<never>

  panic(...args: unknown[]): Promise<never>
  panicf(template: string, ...args: unknown[]): Promise<never>
  panicln(...args: unknown[]): Promise<never>
}

type NonCritical = Exclude<Severity, "critical">

/**
 * Structured logging with labels and request context.
 */
export interface ExtendedLogger extends StandardLogger {
  withRequest(req: HttpRequest): ExtendedLogger
  withLabels(labels: Labels): ExtendedLogger

  log(severity: "critical", message: string, ...fields: Field[]): Promise<never>
  log(severity: NonCritical, message: string, ...fields: Field[]): void
  log(severity: Severity, message: string, ...fields: Field[]): void | Promise<never>
  debug(message: string, ...fields: Field[]): void
  info(message: string, ...fields: Field[]): void
  warn(message: string, ...fields: Field[]): void
  error(message: string, ...fields: Field[]): void
  crit(message: string, ...fields: Field[]): Promise<never>

  flush(): Promise<Result<void, Error>>
}

/**
 * Configuration options for {@link createLogger}.
 */
export type LoggerOptions = {
  /**
   * Where local lines are written.
   * @default process.stderr
   */
  stream?: NodeJS.WritableStream

  /**
   * Remote sink to use instead of building a Cloud Logging client from credentials.
   * Pass `None` to log locally only.
   */
  sink?: Option<RemoteSink>

  /**
   * Cloud Logging log name. If not provided, reads from LOG_NAME env var.
   * @default "app"
   */
  logName?: string

  /**
   * Called with the exit status by `crit`, `log("critical")` and the fatal family.
   * @default process.exit
   */
  exit?: ExitFn

  /** @default process.env */
  env?: NodeJS.ProcessEnv
}

type LoggerState = {
  local: winston.Logger
  sink: Option<RemoteSink>
  commonLabels: Readonly<Labels>
  labels: Readonly<Labels>
  request?: HttpRequest
  exit: ExitFn
}

/**
 * Logs every call twice: as a line on a local stream and, when Cloud Logging
 * credentials are available, as an entry in Cloud Logging.
 *
 * @example
 * ```ts
 * const logger = createLogger({ app: "billing", module: "invoices" })
 *
 * logger.printf("processed %d invoices", 12)
 * logger.info("invoice sent", ["invoiceId", "inv_1"], ["amount", 4200])
 *
 * const reqLogger = logger.withLabels({ tenant: "acme" }).withRequest({ requestMethod: "GET" })
 * reqLogger.warn("slow upstream", ["latencyMs", 812])
 *
 * await logger.flush()
 * ```
 */
export class DualLogger implements ExtendedLogger {
  private readonly state: LoggerState

  constructor(state: LoggerState) {
    this.state = state
  }

  /** Labels fixed at construction, shared by every derived logger. */
  public get commonLabels(): Readonly<Labels> {
    return this.state.commonLabels
  }

  /** Whether entries are also sent to a remote sink. */
  public get hasRemote(): boolean {
    return this.state.sink.some
  }

  /** Copy of the per-call labels attached to this logger. */
  public getLabels(): Labels {
    return { ...this.state.labels }
  }

  public getRequest(): HttpRequest | undefined {
    return this.state.request
  }

  /**
   * Creates a child logger with the given request descriptor attached to remote entries.
   */
  public withRequest(req: HttpRequest): DualLogger {
    return new DualLogger({ ...this.state, request: req })
  }

  /**
   * Creates a child logger with additional labels. Keys in `labels` override
   * existing ones; this logger is left untouched.
   */
  public withLabels(labels: Labels): DualLogger {
    return new DualLogger({
      ...this.state,
      labels: {
        ...this.state.labels,
        ...labels,
      },
    })
  }

  public print(...args: unknown[]): void {
    this.emit("info", sprint(args))
  }

  public printf(template: string, ...args: unknown[]): void {
    this.emit("info", format(template, ...args))
  }

  public println(...args: unknown[]): void {
    this.emit("info", sprintln(args))
  }

  /** Log at CRITICAL, flush, then exit with status 1. */
  public fatal(...args: unknown[]): Promise<never> {
    return this.fatalText(sprint(args))
  }

  public fatalf(template: string, ...args: unknown[]): Promise<never> {
    return this.fatalText(format(template, ...args))
  }

  public fatalln(...args: unknown[]): Promise<never> {
    return this.fatalText(sprintln(args))
  }

  /** Log at CRITICAL, flush, then reject with a {@link PanicError}. */
  public panic(...args: unknown[]): Promise<never> {
    return this.panicText(sprint(args))
  }

  public panicf(template: string, ...args: unknown[]): Promise<never> {
    return this.panicText(format(template, ...args))
  }

  public panicln(...args: unknown[]): Promise<never> {
    return this.panicText(sprintln(args))
  }

  /**
   * Structured logging with the given severity.
   * At CRITICAL the process exits once the remote sink has been flushed.
   */
  public log(severity: "critical", message: string, ...fields: Field[]): Promise<never>
  public log(severity: NonCritical, message: string, ...fields: Field[]): void
  public log(severity: Severity, message: string, ...fields: Field[]): void | Promise<never>
  public log(severity: Severity, message: string, ...fields: Field[]): void | Promise<never> {
    this.structured(severity, message, fields)
    if (severity === "critical") {
      return this.terminate()
    }
  }

  public debug(message: string, ...fields: Field[]): void {
    this.structured("debug", message, fields)
  }

  public info(message: string, ...fields: Field[]): void {
    this.structured("info", message, fields)
  }

  public warn(message: string, ...fields: Field[]): void {
    this.structured("warning", message, fields)
  }

  public error(message: string, ...fields: Field[]): void {
    this.structured("error", message, fields)
  }

  /** Log at CRITICAL, flush, then exit with status 1. */
  public crit(message: string, ...fields: Field[]): Promise<never> {
    return this.log("critical", message, ...fields)
  }

  /**
   * Waits until every submitted remote entry has been handed off.
   * Always Ok when there is no remote sink.
   */
  public async flush(): Promise<Result<void, Error>> {
    if (this.state.sink.none) {
      return Ok(undefined)
    }
    return catchToResult(this.state.sink.val.flush(), toError)
  }

  private emit(severity: Severity, text: string): void {
    this.state.local.log(toLocalLevel(severity), text)
    if (this.state.sink.some) {
      this.state.sink.val.write({
        severity,
        payload: text,
        labels: this.state.labels,
        httpRequest: this.state.request,
      })
    }
  }

  private structured(severity: Severity, message: string, fields: readonly Field[]): void {
    const payload = formatPayload(message, fields)
    const line = serializePayload(payload)
    if (line.ok) {
      this.state.local.log(toLocalLevel(severity), line.val)
    } else {
      this.emit("error", `failed to marshal: ${line.val.message}`)
    }
    if (this.state.sink.some) {
      this.state.sink.val.write({
        severity,
        payload,
        labels: this.state.labels,
        httpRequest: this.state.request,
      })
    }
  }

  private async fatalText(text: string): Promise<never> {
    this.emit("critical", text)
    if (this.state.sink.some) {
      await this.flush()
    }
    return this.state.exit(1)
  }

  private async panicText(text: string): Promise<never> {
    this.emit("critical", text)
    if (this.state.sink.some) {
      await this.flush()
    }
    throw new PanicError(text)
  }

  private async terminate(): Promise<never> {
    await this.flush()
    return this.state.exit(1)
  }
}

/**
 * Creates a logger that writes to stderr and, when GOOGLE_APPLICATION_CREDENTIALS
 * points to a readable service account file, to Cloud Logging.
 *
 * Missing or broken credentials never fail construction: a warning is written
 * locally and the logger runs local-only.
 *
 * @param commonLabels Labels for every remote entry. `app` and `module` also
 * become the local line prefix.
 */
export function createLogger(commonLabels?: Labels, options: LoggerOptions = {}): DualLogger {
  const {
    env = process.env,
    stream,
    logName = env.LOG_NAME || "app",
    exit = (code: number) => process.exit(code),
  } = options

  const prefix = commonLabels ? linePrefix(commonLabels) : ""
  const local = createLocalWriter(prefix, stream)

  const sink = options.sink ?? buildRemoteSink(commonLabels, logName, env, (text) => local.warn(text))

  return new DualLogger({
    local,
    sink,
    commonLabels: { ...commonLabels },
    labels: {},
    exit,
  })
}

function buildRemoteSink(
  commonLabels: Labels | undefined,
  logName: string,
  env: NodeJS.ProcessEnv,
  warn: (text: string) => void,
): Option<RemoteSink> {
  const credentials = resolveCredentials(env)
  if (credentials.err) {
    warn(`Failed to get GCP credentials: ${credentials.val.message}`)
    return None
  }
  const sink = buildCloudSink(credentials.val, { commonLabels, logName })
  if (sink.err) {
    warn(`Failed to create GCP logging client: ${sink.val}`)
    return None
  }
  return Some(sink.val)
}

function linePrefix(commonLabels: Labels): string {
  const app = commonLabels.app ?? ""
  const module = commonLabels.module ?? ""
  return `${app} ${module}`.trim() + " "
}

/**
 * Local writer: one line per call, `YYYY/MM/DD HH:mm:ss <prefix><text>`.
 */
function createLocalWriter(prefix: string, stream?: NodeJS.WritableStream): winston.Logger {
  const transport = stream
    ? new winston.transports.Stream({ stream })
    : new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })

  return winston.createLogger({
    level: "debug",
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY/MM/DD HH:mm:ss" }),
      winston.format.printf(({ timestamp, message }) => `${timestamp} ${prefix}${message}`),
    ),
    transports: [transport],
  })
}

/**
 * Joins operands, adding a space between two operands when neither is a string.
 */
export function sprint(args: readonly unknown[]): string {
  let out = ""
  args.forEach((arg, i) => {
    if (i > 0 && typeof arg !== "string" && typeof args[i - 1] !== "string") {
      out += " "
    }
    out += typeof arg === "string" ? arg : format("%s", arg)
  })
  return out
}

/**
 * Joins operands with single spaces. No trailing newline is appended: the local
 * writer terminates each line itself, so remote string payloads from `println`
 * carry no `"\n"` either.
 */
export function sprintln(args: readonly unknown[]): string {
  return args.map((arg) => (typeof arg === "string" ? arg : format("%s", arg))).join(" ")
}
