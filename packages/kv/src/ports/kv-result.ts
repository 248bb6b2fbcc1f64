export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/** A miss means the key does not exist; nothing is evicted behind the caller's back. */
export type KvResult<T> = KvFound<T> | KvNotFound
