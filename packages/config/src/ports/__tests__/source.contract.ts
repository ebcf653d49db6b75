import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  make: () => ConfigSource
  expectedValue: () => Record<string, string | undefined>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let source: ConfigSource

    beforeEach(() => {
      source = h.make()
    })

    it("has a non-empty name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(Array.isArray(result)).toBe(false)
      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() is idempotent", async () => {
      const a = await source.load()
      const b = await source.load()

      expect(b).toEqual(a)
    })

    it("load() does not leak a mutable reference", async () => {
      const first = await source.load()
      first.__CONFIG_TEST_MUTATION__ = "x"

      const second = await source.load()

      expect(second).not.toHaveProperty("__CONFIG_TEST_MUTATION__")
    })

    it("load() returns expected values", async () => {
      expect(await source.load()).toMatchObject(h.expectedValue())
    })
  })
}
