import type { Singleflight } from "../single-flight"
import { deferred } from "./deferred"

export function describeSingleflightContract(
  name: string,
  factory: () => Singleflight<unknown>,
): void {
  describe(`${name} contract`, () => {
    let flights: Singleflight<unknown>

    beforeEach(() => {
      flights = factory()
    })

    describe("run", () => {
      it("executes fn once for concurrent callers of one key", async () => {
        let calls = 0
        const fn = async () => {
          calls++
          return "result"
        }

        await Promise.all([flights.run("k", fn), flights.run("k", fn), flights.run("k", fn)])

        expect(calls).toBe(1)
      })

      it("gives every caller the same value and follower count", async () => {
        const gate = deferred<{ id: number }>()
        const obj = { id: 1 }

        const pending = [1, 2, 3].map(() => flights.run("k", () => gate.promise))
        gate.resolve(obj)
        const results = await Promise.all(pending)

        expect(results.map((r) => r.isLeader)).toEqual([true, false, false])
        for (const result of results) {
          expect(result.value).toBe(obj)
          expect(result.sharedWith).toBe(2)
        }
      })

      it("rejects every caller with the leader's error", async () => {
        const error = new Error("failure")
        const fn = async () => {
          throw error
        }

        const results = await Promise.allSettled([flights.run("k", fn), flights.run("k", fn)])

        expect(results).toEqual([
          { status: "rejected", reason: error },
          { status: "rejected", reason: error },
        ])
      })

      it("starts fresh after a flight settles", async () => {
        let calls = 0
        const fn = async () => ++calls

        const first = await flights.run("k", fn)
        const second = await flights.run("k", fn)

        expect([first.value, second.value]).toEqual([1, 2])
        expect(second.isLeader).toBe(true)
        expect(flights.size).toBe(0)
      })

      it("keeps different keys independent", async () => {
        const [a, b] = await Promise.all([
          flights.run("a", async () => "A"),
          flights.run("b", async () => "B"),
        ])

        expect([a.value, b.value, a.isLeader, b.isLeader]).toEqual(["A", "B", true, true])
      })
    })

    describe("tryRun", () => {
      it("returns undefined while the key is in flight", async () => {
        const gate = deferred<string>()
        const leader = flights.run("k", () => gate.promise)

        expect(flights.tryRun("k", async () => "other")).toBeUndefined()
        expect(flights.has("k")).toBe(true)

        gate.resolve("value")
        await leader
      })

      it("runs when nothing is in flight", async () => {
        const result = await flights.tryRun("k", async () => "value")

        expect(result).toEqual({ value: "value", isLeader: true, sharedWith: 0 })
      })
    })

    describe("forget", () => {
      it("lets the next caller start a new flight while the old one finishes", async () => {
        const firstGate = deferred<string>()
        const secondGate = deferred<string>()

        const first = flights.run("k", () => firstGate.promise)
        flights.forget("k")
        const second = flights.run("k", () => secondGate.promise)

        firstGate.resolve("one")
        expect((await first).value).toBe("one")
        expect(flights.has("k")).toBe(true)

        secondGate.resolve("two")
        expect((await second).value).toBe("two")
        expect(flights.size).toBe(0)
      })

      it("is a no-op for an unknown key", () => {
        expect(() => flights.forget("nope")).not.toThrow()
      })
    })
  })
}
