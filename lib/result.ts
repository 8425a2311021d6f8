/**
 * Result type for lookups whose miss is an expected outcome.
 *
 * Represents either success (Ok) or failure (Err). The graph store returns
 * `Result<ContractRecord, NotFoundError>` so an unknown contract id is a
 * value on the normal path, not an exception.
 *
 * @example
 * ```typescript
 * const result = await store.get(contractId)
 *
 * if (!result.ok) {
 *   return { found: false, error: result.error.toJSON() }
 * }
 *
 * return { found: true, contract: result.value }
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
