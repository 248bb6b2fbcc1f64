/**
 * The error followed by its `cause` chain, outermost first.
 * Stops at cycles and after `maxDepth` links.
 */
export function errorChain(err: unknown, maxDepth = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()
  let current: unknown = err

  while (current !== undefined && current !== null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = current instanceof Error ? current.cause : undefined
  }

  return chain
}

/** First link of the chain that is an instance of `type`, if any. */
export function findInChain<T extends Error>(
  err: unknown,
  type: abstract new (...args: never[]) => T,
): T | undefined {
  for (const link of errorChain(err)) {
    if (link instanceof type) return link
  }

  return undefined
}
