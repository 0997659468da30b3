import { readFileSync } from "fs"
import { Err, Ok, Result } from "ts-results"
import { z } from "zod"
import { errorMessage } from "./utils/catch-to-result"

/**
 * Name of the env variable pointing to the JSON file with GCP credentials.
 */
export const ENV_CREDENTIALS = "GOOGLE_APPLICATION_CREDENTIALS"

export type CredentialError =
  | { kind: "missing-config"; message: string }
  | { kind: "read-error"; path: string; message: string }
  | { kind: "parse-error"; path: string; message: string }

const credentialsSchema = z.object({
  project_id: z.string(),
})

export type Credentials = {
  projectId: string
  keyFilename: string
}

/**
 * Reads the service account file named by GOOGLE_APPLICATION_CREDENTIALS and
 * extracts its `project_id`.
 */
export function resolveCredentials(
  env: NodeJS.ProcessEnv = process.env,
): Result<Credentials, CredentialError> {
  const keyFilename = env[ENV_CREDENTIALS]
  if (!keyFilename) {
    return Err({ kind: "missing-config", message: `env var ${ENV_CREDENTIALS} is not set` })
  }

  let raw: string
  try {
    raw = readFileSync(keyFilename, "utf8")
  } catch (e) {
    return Err({
      kind: "read-error",
      path: keyFilename,
      message: `read ${keyFilename} failed: ${errorMessage(e)}`,
    })
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (e) {
    return Err({
      kind: "parse-error",
      path: keyFilename,
      message: `parse ${keyFilename} failed: ${errorMessage(e)}`,
    })
  }

  const parsed = credentialsSchema.safeParse(json)
  if (!parsed.success) {
    return Err({
      kind: "parse-error",
      path: keyFilename,
      message: `parse ${keyFilename} failed: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    })
  }

  return Ok({ projectId: parsed.data.project_id, keyFilename })
}

/** Project id only, for callers that don't need the key file path. */
export function resolveProjectId(env: NodeJS.ProcessEnv = process.env): Result<string, CredentialError> {
  return resolveCredentials(env).map((c) => c.projectId)
}
