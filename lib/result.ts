/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err). The validator uses it to
 * carry per-chunk failures alongside successful match outcomes so one bad
 * chunk never aborts a whole contract run.
 *
 * @example
 * ```typescript
 * const outcome = await tryCatchWith(() => matcher.match(chunk, k, library), toAppError)
 *
 * if (!outcome.ok) {
 *   failures.push({ chunkId: chunk.chunkId, error: outcome.error })
 * }
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Wrap an async operation with a custom error mapper.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}

/**
 * Split results into success values and errors, preserving order.
 */
export function partition<T, E>(
  results: Array<Result<T, E>>
): { values: T[]; errors: E[] } {
  const values: T[] = []
  const errors: E[] = []
  for (const result of results) {
    if (result.ok) values.push(result.value)
    else errors.push(result.error)
  }
  return { values, errors }
}
