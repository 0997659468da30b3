import { Err, Ok, Result } from "ts-results"

/** A single structured field: key and value. */
export type Field = readonly [key: string, value: unknown]

/** Structured payload sent to the remote sink. Always carries `message`. */
export type Payload = {
  message: string
  [key: string]: unknown
}

/**
 * Thrown by {@link pairs} when a key position holds something other than a string.
 * This is a bug at the call site, not a runtime condition to recover from.
 */
export class InvalidFieldKeyError extends Error {
  constructor(
    public readonly position: number,
    public readonly key: unknown,
  ) {
    super(`field key at position ${position} must be a string, got ${typeof key}`)
    this.name = "InvalidFieldKeyError"
  }
}

/**
 * Builds the structured payload for a log call.
 * Fields are applied in order, so a later key overwrites an earlier one
 * (including `message`). Every key becomes an own property, `__proto__` included.
 */
export function formatPayload(message: string, fields: readonly Field[] = []): Payload {
  const result: Payload = { message }
  for (const [key, value] of fields) {
    Object.defineProperty(result, key, { value, enumerable: true, writable: true, configurable: true })
  }
  return result
}

/**
 * Converts an alternating key/value list into fields.
 *
 * An odd-length list drops its trailing key.
 *
 * @example
 * ```ts
 * logger.info("user created", ...pairs("userId", 42, "admin", false))
 * ```
 */
export function pairs(...args: unknown[]): Field[] {
  const fields: Field[] = []
  for (let i = 0; i < args.length; i += 2) {
    const key = args[i]
    if (typeof key !== "string") {
      throw new InvalidFieldKeyError(i, key)
    }
    if (i + 1 < args.length) {
      fields.push([key, args[i + 1]])
    }
  }
  return fields
}

/**
 * Serializes a payload to a single JSON line.
 * Handles BigInt and Error values; circular structures produce an Err.
 */
export function serializePayload(payload: Payload): Result<string, Error> {
  try {
    return Ok(JSON.stringify(payload, replacer))
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)))
  }
}

const replacer = (_key: string, value: unknown): unknown => {
  if (typeof value === "bigint") {
    return value.toString()
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    }
  }
  return value
}
