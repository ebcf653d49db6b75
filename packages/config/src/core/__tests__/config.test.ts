import { Config } from "../config"

describe("Config", () => {
  const data = { CACHE_CAPACITY: 64, CACHE_REFRESH: false, CACHE_POLICY: "lru" }
  const provenance = { CACHE_CAPACITY: "env", CACHE_POLICY: "object:overrides" }
  const config = new Config(data, provenance, new Set(["CACHE_CAPACITY", "CACHE_POLICY", "STALE"]))

  it("exposes the validated value", () => {
    expect(config.value).toEqual(data)
  })

  it("explains the source of each key", () => {
    expect(config.explain("CACHE_CAPACITY")).toBe("env")
    expect(config.explain("CACHE_POLICY")).toBe("object:overrides")
    expect(config.explain("CACHE_REFRESH")).toBe("default")
  })

  it("lists sources used once each", () => {
    expect(config.sourcesUsed()).toEqual(["env", "object:overrides"])
  })

  it("reports provided keys the schema does not know", () => {
    expect(config.unknownKeys()).toEqual(["STALE"])
  })

  it("freezes its value", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("does not alias the input object", () => {
    const input = { A: 1 }
    const cfg = new Config(input, {}, new Set())

    input.A = 2

    expect(cfg.value.A).toBe(1)
  })
})
