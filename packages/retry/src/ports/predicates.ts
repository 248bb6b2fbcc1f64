import type { AttemptContext } from "./attempt-context"

/** Decides whether a thrown value is worth another attempt. */
export type RetryPredicate = (error: unknown, ctx: AttemptContext) => boolean
