/**
 * Bidirectional transformation between a typed value and bytes.
 *
 * @remarks
 * Codecs sit between typed stores (`KeyValueStore<T>`) and byte-oriented
 * adapters. Adapters treat codec output as opaque and never import codecs.
 *
 * `decode` may throw on bytes it does not recognise; the error propagates
 * out of the typed store's read.
 *
 * @example
 * ```ts
 * const jsonCodec: Codec<Settings> = {
 *   encode: (value) => new TextEncoder().encode(JSON.stringify(value)),
 *   decode: (bytes) => settingsSchema.parse(JSON.parse(new TextDecoder().decode(bytes))),
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
