export const lifecycleStates = [
  "submitted",
  "validating",
  "running",
  "succeeded",
  "failed",
  "cancelled",
  "timed_out",
] as const

export type LifecycleState = (typeof lifecycleStates)[number]

export type TerminalState = Extract<
  LifecycleState,
  "succeeded" | "failed" | "cancelled" | "timed_out"
>

/** Terminal states that carry something to fetch from the service. */
export type RetrievableState = Extract<TerminalState, "succeeded" | "failed">

/** States the service can report; `timed_out` is only ever decided locally. */
export type ReportableState = Exclude<LifecycleState, "timed_out">

/** Status strings of the OpenAI Batch API. */
export type ProviderStatus =
  | "validating"
  | "in_progress"
  | "finalizing"
  | "cancelling"
  | "completed"
  | "failed"
  | "expired"
  | "cancelled"

/**
 * Closed vocabulary of raw statuses. Canonical state names are accepted too,
 * so a service may report lifecycle states directly.
 */
const rawStatusTable: Readonly<Record<ProviderStatus | ReportableState, ReportableState>> = {
  submitted: "submitted",
  validating: "validating",
  running: "running",
  in_progress: "running",
  finalizing: "running",
  cancelling: "running",
  completed: "succeeded",
  succeeded: "succeeded",
  failed: "failed",
  expired: "failed",
  cancelled: "cancelled",
}

const rawStatuses = new Map<string, ReportableState>(Object.entries(rawStatusTable))

export function lookupRawStatus(raw: string): ReportableState | undefined {
  return rawStatuses.get(raw)
}

export function isTerminal(state: LifecycleState): state is TerminalState {
  return stateRank(state) === TERMINAL_RANK
}

export function isRetrievable(state: LifecycleState): state is RetrievableState {
  return state === "succeeded" || state === "failed"
}

export function isLifecycleState(value: unknown): value is LifecycleState {
  return lifecycleStates.some((state) => state === value)
}

const TERMINAL_RANK = 3

/** Position in the forward-only order submitted < validating < running < terminal. */
export function stateRank(state: LifecycleState): number {
  switch (state) {
    case "submitted":
      return 0
    case "validating":
      return 1
    case "running":
      return 2
    case "succeeded":
    case "failed":
    case "cancelled":
    case "timed_out":
      return TERMINAL_RANK
  }
}
