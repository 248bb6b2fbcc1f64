/** The slice of a node-redis client (with Buffer type mapping) the adapter uses. */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>

  exists(keys: string | readonly string[]): Promise<number>

  set(key: string, value: Buffer, opts?: { NX?: boolean }): Promise<string | null>
  del(keys: string | readonly string[]): Promise<number>

  multi(): {
    set(key: string, value: Buffer): unknown
    exec(): Promise<unknown>
  }

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}
