/** A duration in milliseconds. */
export type Milliseconds = number

/** A duration in whole seconds. */
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number
