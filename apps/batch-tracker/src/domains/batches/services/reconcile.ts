import { ProtocolError } from "../model/batch.errors"
import {
  isTerminal,
  type LifecycleState,
  lookupRawStatus,
  stateRank,
} from "../model/lifecycle.model"

/**
 * Maps a raw status onto the lifecycle, given the state we last recorded.
 *
 * Repeating the current state is a no-op. Throws `ProtocolError` for a status
 * outside the vocabulary, a move to a lower rank, or any change away from a
 * terminal state.
 */
export function reconcile(previous: LifecycleState, rawStatus: string): LifecycleState {
  const next = lookupRawStatus(rawStatus)

  if (next === undefined) throw ProtocolError.unknownStatus(rawStatus, previous)
  if (next === previous) return previous

  if (isTerminal(previous) || stateRank(next) < stateRank(previous)) {
    throw ProtocolError.illegalTransition(previous, next, rawStatus)
  }

  return next
}
