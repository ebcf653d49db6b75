import { FakeClock } from "@cachet/clock"
import { CacheUsageError, TimeBoundsError } from "../../../core/errors"
import { mockLogger } from "../../../tests/utils/mock-logger"
import { ExpiringSizedCache } from "../expiring-sized-cache"

describe("ExpiringSizedCache (behavior)", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(1_000)
  })

  const make = (opts: { sizeLimit?: number; maxTombstones?: number } = {}) =>
    new ExpiringSizedCache<string, string>({ lifespanMs: 100, ...opts }, { clock })

  it("walks through eviction, retention and removal", () => {
    const cache = make()

    expect(cache.evict()).toBe(0)
    expect(cache.retainLatest(100, true)).toBe(0)
    expect(cache.get("a")).toBeUndefined()

    cache.insert("a", "A")
    expect(cache.get("a")).toBe("A")
    expect(cache.size()).toBe(1)

    clock.advance(200)
    expect(cache.evict()).toBe(1)
    expect(cache.get("a")).toBeUndefined()
    expect(cache.size()).toBe(0)

    cache.insert("a", "A")
    clock.advance(200)
    expect(cache.retainLatest(1, false)).toBe(0)
    expect(cache.get("a")).toBeUndefined()
    expect(cache.size()).toBe(1)
    expect(cache.retainLatest(1, true)).toBe(1)
    expect(cache.size()).toBe(0)

    for (const key of ["a", "b", "c", "d", "e"]) cache.insert(key, key)
    expect(cache.retainLatest(2, false)).toBe(3)
    expect(cache.size()).toBe(2)
    expect(cache.get("c")).toBeUndefined()
    expect(cache.get("d")).toBe("d")
    expect(cache.get("e")).toBe("e")

    cache.insert("a", "a")
    cache.insert("a", "a")
    cache.insert("b", "b")
    cache.insert("b", "b")
    expect(cache.size()).toBe(4)
    expect(cache.retainLatest(2, false)).toBe(2)
    expect(cache.get("d")).toBeUndefined()
    expect(cache.get("e")).toBeUndefined()
    expect(cache.get("a")).toBe("a")
    expect(cache.get("b")).toBe("b")

    clock.advance(200)
    expect(cache.remove("a")).toBe("a")
    expect(cache.size()).toBe(1)

    cache.insert("a", "a")
    expect(cache.remove("a")).toBe("a")
    expect(cache.size()).toBe(1)
    expect(cache.evict()).toBe(1)
    expect(cache.size()).toBe(0)
  })

  describe("reads", () => {
    it("never remove an expired entry", () => {
      const cache = make()

      cache.insert("a", "A")
      clock.advance(100)

      expect(cache.get("a")).toBeUndefined()
      expect(cache.size()).toBe(1)
      expect(cache.stampCount()).toBe(1)
    })
  })

  describe("insert", () => {
    it("returns the previous value only while it is live", () => {
      const cache = make()

      expect(cache.insert("a", "1")).toBeUndefined()
      expect(cache.insert("a", "2")).toBe("1")

      clock.advance(100)

      expect(cache.insert("a", "3")).toBeUndefined()
      expect(cache.get("a")).toBe("3")
    })

    it("with evict drops expired entries first", () => {
      const cache = make()

      cache.insert("a", "a")
      clock.advance(100)
      cache.insert("b", "b", { evict: true })

      expect(cache.size()).toBe(1)
      expect(cache.get("b")).toBe("b")
    })
  })

  describe("size limit", () => {
    it("drops the oldest entry to admit a new key", () => {
      const cache = make({ sizeLimit: 3 })

      for (const key of ["a", "b", "c", "d"]) cache.insert(key, key)

      expect(cache.size()).toBe(3)
      expect(cache.get("a")).toBeUndefined()
      expect(cache.get("d")).toBe("d")
    })

    it("overwriting a key in a full store drops nothing", () => {
      const cache = make({ sizeLimit: 3 })

      for (const key of ["a", "b", "c"]) cache.insert(key, key)
      cache.insert("a", "A")

      expect(cache.size()).toBe(3)
      expect(cache.get("a")).toBe("A")
      expect(cache.get("b")).toBe("b")
    })

    it("with evict also drops every expired entry", () => {
      const cache = make({ sizeLimit: 3 })

      cache.insert("a", "a")
      cache.insert("b", "b")
      clock.advance(50)
      cache.insert("c", "c")
      clock.advance(60)
      cache.insert("d", "d", { evict: true })

      expect(cache.size()).toBe(2)
      expect(cache.get("c")).toBe("c")
      expect(cache.get("d")).toBe("d")
    })

    it("without evict keeps expired entries that fit", () => {
      const cache = make({ sizeLimit: 3 })

      cache.insert("a", "a")
      cache.insert("b", "b")
      clock.advance(50)
      cache.insert("c", "c")
      clock.advance(60)
      cache.insert("d", "d")

      expect(cache.size()).toBe(3)
    })

    it("setSizeLimit returns the previous limit and applies on the next insert", () => {
      const cache = make()

      expect(cache.capacity()).toBeUndefined()
      expect(cache.setSizeLimit(2)).toBeUndefined()
      expect(cache.setSizeLimit(2)).toBe(2)

      for (const key of ["a", "b", "c"]) cache.insert(key, key)

      expect(cache.size()).toBe(2)
      expect(cache.capacity()).toBe(2)
    })
  })

  describe("tombstones", () => {
    it("an overwrite leaves one tombstone per replaced stamp", () => {
      const cache = make({ maxTombstones: 3 })

      for (let i = 1; i <= 4; i++) cache.insert("a", String(i))

      expect(cache.tombstoneCount()).toBe(3)
      expect(cache.stampCount()).toBe(4)
    })

    it("compacts once the count passes the limit", () => {
      const cache = make({ maxTombstones: 3 })

      for (let i = 1; i <= 5; i++) cache.insert("a", String(i))

      expect(cache.tombstoneCount()).toBe(0)
      expect(cache.stampCount()).toBe(1)
      expect(cache.get("a")).toBe("5")
    })

    it("remove tombstones the stamp", () => {
      const cache = make()

      cache.insert("a", "a")
      cache.remove("a")

      expect(cache.tombstoneCount()).toBe(1)
      expect(cache.stampCount()).toBe(1)
      expect(cache.remove("a")).toBeUndefined()
    })

    it("eviction is idempotent", () => {
      const cache = make()

      cache.insert("a", "a")
      cache.insert("b", "b")
      clock.advance(100)

      expect(cache.evict()).toBe(2)
      expect(cache.evict()).toBe(0)
      expect(cache.tombstoneCount()).toBe(2)
    })

    it("clear drops stamps and tombstones", () => {
      const cache = make()

      cache.insert("a", "a")
      cache.insert("a", "b")
      cache.clear()

      expect(cache.size()).toBe(0)
      expect(cache.stampCount()).toBe(0)
      expect(cache.tombstoneCount()).toBe(0)
    })

    it("logs compaction at debug", () => {
      const logger = mockLogger()
      const cache = new ExpiringSizedCache<string, string>(
        { lifespanMs: 100, maxTombstones: 1 },
        { clock, logger },
      )

      for (let i = 0; i < 3; i++) cache.insert("a", "a")

      expect(logger.debug).toHaveBeenCalledWith("compacted expiry stamps", {
        dropped: 2,
        before: 3,
        after: 1,
      })
    })
  })

  describe("shorter lifespan", () => {
    it("keeps stamps ordered and repairs shifted entries", () => {
      const cache = make()

      cache.insert("a", "a")
      cache.insert("c", "c")
      cache.setLifespan(10)
      cache.insert("b", "b")
      cache.remove("a")

      clock.advance(10)

      expect(cache.evict()).toBe(1)
      expect(cache.get("b")).toBeUndefined()
      expect(cache.get("c")).toBe("c")

      clock.advance(90)

      expect(cache.evict()).toBe(1)
      expect(cache.size()).toBe(0)
    })

    it("setLifespan returns the previous lifespan", () => {
      const cache = make()

      expect(cache.setLifespan(10)).toBe(100)
      expect(cache.lifespan()).toBe(10)
    })
  })

  describe("per-entry lifespan", () => {
    it("expires a shorter-lived entry ahead of older ones", () => {
      const cache = make()

      cache.insert("a", "a")
      cache.insert("b", "b", { ttlMs: 10 })
      cache.insert("c", "c", { ttlMs: 50 })
      expect(cache.remove("a")).toBe("a")
      expect(cache.tombstoneCount()).toBe(1)

      clock.advance(10)
      expect(cache.evict()).toBe(1)
      expect(cache.get("b")).toBeUndefined()
      expect(cache.get("c")).toBe("c")

      clock.advance(40)
      expect(cache.evict()).toBe(1)
      expect(cache.get("c")).toBeUndefined()
      expect(cache.size()).toBe(0)
      expect(cache.tombstoneCount()).toBe(3)
      expect(cache.stampCount()).toBe(3)
    })

    it("orders retention by expiry, not insertion", () => {
      const cache = make()

      cache.insert("a", "a")
      cache.insert("b", "b", { ttlMs: 10 })

      expect(cache.retainLatest(1, false)).toBe(1)
      expect(cache.get("a")).toBe("a")
      expect(cache.get("b")).toBeUndefined()
    })

    it("drops the short-lived entry first when the size limit is reached", () => {
      const cache = make({ sizeLimit: 2 })

      cache.insert("a", "a")
      cache.insert("b", "b", { ttlMs: 10 })
      cache.insert("c", "c")

      expect(cache.size()).toBe(2)
      expect(cache.get("a")).toBe("a")
      expect(cache.get("b")).toBeUndefined()
      expect(cache.get("c")).toBe("c")
    })

    it("replacing a key buries its old stamp", () => {
      const cache = make()

      cache.insert("a", "a1")
      expect(cache.insert("a", "a2", { ttlMs: 10 })).toBe("a1")
      expect(cache.stampCount()).toBe(2)
      expect(cache.tombstoneCount()).toBe(1)

      clock.advance(10)
      expect(cache.get("a")).toBeUndefined()
      expect(cache.evict()).toBe(1)
      expect(cache.tombstoneCount()).toBe(2)
    })

    it("combines with evict", () => {
      const cache = make()

      cache.insert("x", "x", { ttlMs: 10 })
      clock.advance(10)
      cache.insert("y", "y", { evict: true, ttlMs: 5 })

      expect(cache.size()).toBe(1)
      expect(cache.tombstoneCount()).toBe(1)
      expect(cache.get("y")).toBe("y")

      clock.advance(5)
      expect(cache.get("y")).toBeUndefined()
    })

    it("leaves the store lifespan unchanged", () => {
      const cache = make()

      cache.insert("a", "a", { ttlMs: 10 })

      expect(cache.lifespan()).toBe(100)
    })

    it("rejects a negative lifespan before touching the store", () => {
      const cache = make()

      expect(() => cache.insert("a", "a", { ttlMs: -1 })).toThrow(CacheUsageError)
      expect(cache.size()).toBe(0)
      expect(cache.stampCount()).toBe(0)
    })

    it("reports an unrepresentable per-entry expiry", () => {
      const logger = mockLogger()
      const cache = new ExpiringSizedCache<string, string>({ lifespanMs: 100 }, { clock, logger })

      try {
        cache.insert("a", "a", { ttlMs: Number.MAX_SAFE_INTEGER })
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(TimeBoundsError)
        expect(err).toMatchObject({
          context: { nowMs: 1_000, ttlMs: Number.MAX_SAFE_INTEGER },
        })
      }
      expect(cache.size()).toBe(0)
      expect(logger.warn).toHaveBeenCalledWith("rejected insert: expiry out of range", {
        nowMs: 1_000,
        ttlMs: Number.MAX_SAFE_INTEGER,
      })
    })
  })

  describe("time bounds", () => {
    it("rejects an unrepresentable expiry without touching the store", () => {
      const logger = mockLogger()
      const cache = new ExpiringSizedCache<string, string>(
        { lifespanMs: Number.MAX_SAFE_INTEGER },
        { clock, logger },
      )

      expect(() => cache.insert("a", "a")).toThrow(TimeBoundsError)
      expect(cache.size()).toBe(0)
      expect(cache.stampCount()).toBe(0)
      expect(logger.warn).toHaveBeenCalledWith("rejected insert: expiry out of range", {
        nowMs: 1_000,
        ttlMs: Number.MAX_SAFE_INTEGER,
      })
    })

    it("getOrSetWith fails before calling the factory", () => {
      const cache = new ExpiringSizedCache<string, string>(
        { lifespanMs: Number.MAX_SAFE_INTEGER },
        { clock },
      )
      const factory = vi.fn(() => "a")

      expect(() => cache.getOrSetWith("a", factory)).toThrow(TimeBoundsError)
      expect(factory).not.toHaveBeenCalled()
    })

    it("carries the offending instant in its context", () => {
      const cache = new ExpiringSizedCache<string, string>(
        { lifespanMs: Number.MAX_SAFE_INTEGER },
        { clock },
      )

      try {
        cache.set("a", "a")
        expect.unreachable()
      } catch (err) {
        expect(err).toMatchObject({
          code: "cache_time_bounds",
          context: { nowMs: 1_000, ttlMs: Number.MAX_SAFE_INTEGER },
        })
      }
    })
  })

  describe("key identity", () => {
    it("looks structured keys up by content", () => {
      const cache = new ExpiringSizedCache<string[], string>(
        { lifespanMs: 100, keyIdentity: (key) => key.join("/") },
        { clock },
      )

      cache.insert(["users", "42"], "ada")

      expect(cache.get(["users", "42"])).toBe("ada")
      expect(cache.getBorrowed("users/42")).toBe("ada")
    })

    it("defaults to the key itself", () => {
      const cache = new ExpiringSizedCache<string[], string>({ lifespanMs: 100 }, { clock })
      const key = ["users", "42"]

      cache.insert(key, "ada")

      expect(cache.get(key)).toBe("ada")
      expect(cache.get(["users", "42"])).toBeUndefined()
    })
  })

  describe("validation", () => {
    it.each([
      { sizeLimit: 0 },
      { sizeLimit: 1.5 },
      { maxTombstones: 0 },
    ])("rejects %o", (opts) => {
      expect(() => make(opts)).toThrow(CacheUsageError)
    })

    it("rejects a negative lifespan", () => {
      expect(() => new ExpiringSizedCache({ lifespanMs: -5 })).toThrow(CacheUsageError)
    })
  })
})
