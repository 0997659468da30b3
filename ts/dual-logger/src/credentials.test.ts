import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { ENV_CREDENTIALS, resolveCredentials, resolveProjectId } from "./credentials"
import { createLogger } from "./logger"
import { captureStream, stripTimestamp } from "./test-utils"

describe("resolveCredentials", () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "dual-logger-"))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  const writeFile = (name: string, content: string): string => {
    const path = join(dir, name)
    writeFileSync(path, content)
    return path
  }

  it("fails with missing-config when the env var is unset", () => {
    const result = resolveCredentials({})
    expect(result.err).toBe(true)
    expect(result.val).toEqual({
      kind: "missing-config",
      message: "env var GOOGLE_APPLICATION_CREDENTIALS is not set",
    })
  })

  it("treats an empty env var as unset", () => {
    const result = resolveCredentials({ [ENV_CREDENTIALS]: "" })
    expect(result.val).toHaveProperty("kind", "missing-config")
  })

  it("fails with read-error when the file is missing", () => {
    const path = join(dir, "absent.json")
    const result = resolveCredentials({ [ENV_CREDENTIALS]: path })
    expect(result.err).toBe(true)
    expect(result.val).toHaveProperty("kind", "read-error")
    expect(result.val).toHaveProperty("path", path)
    expect(result.val).toHaveProperty("message", expect.stringContaining(`read ${path} failed: ENOENT`))
  })

  it("fails with parse-error on invalid JSON", () => {
    const path = writeFile("broken.json", "{not json")
    const result = resolveCredentials({ [ENV_CREDENTIALS]: path })
    expect(result.val).toHaveProperty("kind", "parse-error")
    expect(result.val).toHaveProperty("message", expect.stringContaining(`parse ${path} failed:`))
  })

  it("fails with parse-error when project_id is not a string", () => {
    const path = writeFile("no-project.json", JSON.stringify({ project_id: 7 }))
    const result = resolveCredentials({ [ENV_CREDENTIALS]: path })
    expect(result.val).toHaveProperty("kind", "parse-error")
  })

  it("returns the project id and key file", () => {
    const path = writeFile("sa.json", JSON.stringify({ type: "service_account", project_id: "test-project" }))
    const result = resolveCredentials({ [ENV_CREDENTIALS]: path })
    expect(result.ok).toBe(true)
    expect(result.val).toEqual({ projectId: "test-project", keyFilename: path })
    expect(resolveProjectId({ [ENV_CREDENTIALS]: path }).unwrap()).toBe("test-project")
  })

  it("makes createLogger warn and stay local when the file is unreadable", async () => {
    const { stream, lines } = captureStream()
    const path = join(dir, "absent.json")
    const logger = createLogger({ app: "billing" }, { env: { [ENV_CREDENTIALS]: path }, stream })

    expect(logger.hasRemote).toBe(false)
    const out = (await lines()).map(stripTimestamp)
    expect(out).toHaveLength(1)
    expect(out[0]).toMatch(new RegExp(`^billing Failed to get GCP credentials: read ${path} failed: ENOENT`))
  })

  it("makes createLogger build a Cloud Logging sink when credentials resolve", async () => {
    const { stream, lines } = captureStream()
    const path = writeFile("sink.json", JSON.stringify({ project_id: "test-project" }))
    const logger = createLogger({ app: "billing" }, { env: { [ENV_CREDENTIALS]: path }, stream })

    expect(logger.hasRemote).toBe(true)
    expect(await lines()).toEqual([])
  })
})
