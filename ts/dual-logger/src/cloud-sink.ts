import { Entry, Logging } from "@google-cloud/logging"
import { Err, Ok, Result } from "ts-results"
import type { Credentials } from "./credentials"
import { toCloudSeverity } from "./severity"
import type { HttpRequest, Labels, RemoteEntry, RemoteSink } from "./sink"
import { errorMessage, toError } from "./utils/catch-to-result"

/** Entry metadata accepted by `@google-cloud/logging`. */
type CloudEntryMetadata = NonNullable<ConstructorParameters<typeof Entry>[0]>

/**
 * The part of a `@google-cloud/logging` `Log` the sink relies on.
 */
export interface LogWriter {
  entry(metadata: CloudEntryMetadata, data: string | object): Entry
  write(entry: Entry): Promise<unknown>
}

/**
 * Raised from {@link CloudLoggingSink.flush} when one or more writes failed.
 */
export class FlushError extends Error {
  constructor(public readonly causes: Error[]) {
    super(`${causes.length} log write(s) failed: ${causes.map((c) => c.message).join("; ")}`)
    this.name = "FlushError"
  }
}

export type CloudSinkConfig = {
  projectId: string
  /** Labels attached to every entry, overlaid by per-entry labels */
  commonLabels?: Labels
}

/**
 * Remote sink backed by Google Cloud Logging.
 *
 * Every entry is attributed to the `project` monitored resource. Writes are
 * fire-and-track: `write()` returns immediately and `flush()` waits for
 * everything still in flight.
 */
export class CloudLoggingSink implements RemoteSink {
  private readonly inFlight = new Set<Promise<void>>()
  private failures: Error[] = []
  private readonly resource: { type: string; labels: Labels }
  private readonly commonLabels: Labels

  constructor(
    private readonly log: LogWriter,
    config: CloudSinkConfig,
  ) {
    this.resource = { type: "project", labels: { project_id: config.projectId } }
    this.commonLabels = config.commonLabels ?? {}
  }

  public write(entry: RemoteEntry): void {
    const metadata: CloudEntryMetadata = {
      severity: toCloudSeverity(entry.severity),
      resource: this.resource,
      labels: { ...this.commonLabels, ...entry.labels },
    }
    if (entry.httpRequest) {
      metadata.httpRequest = toCloudHttpRequest(entry.httpRequest)
    }

    let cloudEntry: Entry
    try {
      cloudEntry = this.log.entry(metadata, entry.payload)
    } catch (e) {
      this.failures.push(toError(e))
      return
    }

    const pending: Promise<void> = this.log.write(cloudEntry).then(
      () => {
        this.inFlight.delete(pending)
      },
      (e: unknown) => {
        this.inFlight.delete(pending)
        this.failures.push(toError(e))
      },
    )
    this.inFlight.add(pending)
  }

  public async flush(): Promise<void> {
    await Promise.all([...this.inFlight])
    const failures = this.failures
    this.failures = []
    if (failures.length > 0) {
      throw new FlushError(failures)
    }
  }

  /** Number of writes not yet acknowledged by the client. */
  public get pending(): number {
    return this.inFlight.size
  }
}

function toCloudHttpRequest(req: HttpRequest): NonNullable<CloudEntryMetadata["httpRequest"]> {
  const { latencySeconds, ...rest } = req
  if (latencySeconds === undefined) {
    return rest
  }
  const seconds = Math.floor(latencySeconds)
  return {
    ...rest,
    latency: { seconds, nanos: Math.round((latencySeconds - seconds) * 1e9) },
  }
}

export type BuildCloudSinkOptions = {
  commonLabels?: Labels
  /** Cloud Logging log name */
  logName: string
}

/**
 * Creates a Cloud Logging client for the given credentials and wraps its log in a sink.
 */
export function buildCloudSink(
  credentials: Credentials,
  options: BuildCloudSinkOptions,
): Result<CloudLoggingSink, string> {
  try {
    const logging = new Logging({
      projectId: credentials.projectId,
      keyFilename: credentials.keyFilename,
    })
    return Ok(
      new CloudLoggingSink(logging.log(options.logName), {
        projectId: credentials.projectId,
        commonLabels: options.commonLabels,
      }),
    )
  } catch (e) {
    return Err(`create GCP logging client failed: ${errorMessage(e)}`)
  }
}
