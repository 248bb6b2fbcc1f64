import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

interface InFlight<T> {
  promise: Promise<T>
  followers: number
}

export class MemorySingleflight<T = unknown> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, InFlight<unknown>>()

  async run<R = T>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> {
    const existing = this.flights.get(key) as InFlight<R> | undefined

    if (existing) {
      existing.followers++
      const value = await existing.promise

      return { value, isLeader: false, sharedWith: existing.followers }
    }

    const flight: InFlight<R> = { promise: fn(), followers: 0 }
    this.flights.set(key, flight)

    try {
      const value = await flight.promise

      return { value, isLeader: true, sharedWith: flight.followers }
    } finally {
      // a forgotten flight may already have been replaced
      if (this.flights.get(key) === flight) this.flights.delete(key)
    }
  }

  tryRun<R = T>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> | undefined {
    if (this.flights.has(key)) return undefined

    return this.run(key, fn)
  }

  forget(key: InFlightKey): void {
    this.flights.delete(key)
  }

  has(key: InFlightKey): boolean {
    return this.flights.has(key)
  }

  get size(): number {
    return this.flights.size
  }
}
