import { Err, Ok, Result } from "ts-results"

export async function catchToResult<T, EOut>(p: Promise<T>, errorMapper: (e: unknown) => EOut): Promise<Result<T, EOut>> {
  try {
    const d = await p
    return Ok(d)
  } catch (e) {
    return Err(errorMapper(e))
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
