import { describe, expect, it, vi } from "vitest"
import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("resolves after the delay elapses", async () => {
    const clock = new SystemClock()
    const start = Date.now()

    await clock.sleep(30)

    expect(Date.now() - start).toBeGreaterThanOrEqual(25)
  })

  it("wakes up early when the signal aborts mid-sleep", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    const start = Date.now()

    const pending = clock.sleep(10_000, ac.signal)
    setTimeout(() => ac.abort(), 20)
    await pending

    expect(Date.now() - start).toBeLessThan(1_000)
  })

  it("detaches its abort listener once the timer fires", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    const removeSpy = vi.spyOn(ac.signal, "removeEventListener")

    await clock.sleep(5, ac.signal)

    expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function))
  })
})
