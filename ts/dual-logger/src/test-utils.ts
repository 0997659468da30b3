import { Writable } from "stream"
import type { RemoteEntry, RemoteSink } from "./sink"

/** In-memory remote sink for tests. */
export class MemorySink implements RemoteSink {
  public entries: RemoteEntry[] = []
  public flushes = 0
  public failWith?: Error

  write(entry: RemoteEntry): void {
    this.entries.push(entry)
  }

  async flush(): Promise<void> {
    this.flushes++
    if (this.failWith) {
      throw this.failWith
    }
  }
}

/** Thrown by {@link exitStub} so tests can observe exit calls without leaving the process. */
export class ExitCalled extends Error {
  constructor(public readonly code: number) {
    super(`exit ${code}`)
  }
}

export function exitStub(code: number): never {
  throw new ExitCalled(code)
}

/**
 * Writable stream collecting everything the local writer emits.
 * winston hands lines to its transports asynchronously, so `lines()` waits a tick first.
 */
export function captureStream(): { stream: Writable; lines: () => Promise<string[]> } {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString())
      callback()
    },
  })
  return {
    stream,
    lines: async () => {
      await new Promise((resolve) => setTimeout(resolve, 20))
      return chunks
        .join("")
        .split("\n")
        .filter((line) => line.length > 0)
    },
  }
}

/** Strips the `YYYY/MM/DD HH:mm:ss ` timestamp from a local line. */
export function stripTimestamp(line: string): string {
  return line.replace(/^\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2} /, "")
}
