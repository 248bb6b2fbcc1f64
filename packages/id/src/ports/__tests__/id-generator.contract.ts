import type { IdGenerator } from "../id-generator"

export function describeIdGeneratorContract(
  name: string,
  createGenerator: () => IdGenerator<string>,
): void {
  describe(`IdGenerator contract: ${name}`, () => {
    it("generates non-empty strings", () => {
      const id = createGenerator().generate()

      expect(typeof id).toBe("string")
      expect(id.length).toBeGreaterThan(0)
    })

    it("generates unique values", () => {
      const generator = createGenerator()
      const ids = new Set(Array.from({ length: 1000 }, () => generator.generate()))

      expect(ids.size).toBe(1000)
    })
  })
}
