function getCause(v: object): unknown {
  return "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` links starting at `err` and return every value visited,
 * outermost first.
 *
 * Stops at the first value without a cause, at `maxDepth` entries, or when a
 * value repeats.
 *
 * @example
 * ```ts
 * const [envelope, dispatch, socket] = errorChain(clientError)
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current !== "object") {
      chain.push(current)
      break
    }

    if (seen.has(current)) break
    seen.add(current)
    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}
