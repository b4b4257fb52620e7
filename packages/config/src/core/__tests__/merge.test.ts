import { isConfigError } from "../config-error"
import type { ConfigFragment, ConfigRecord, FragmentRole } from "../../ports/fragment"
import { cloneRecord, mergeFragments, mergeRecords } from "../merge"

function fragment(role: FragmentRole, source: string, data: ConfigRecord): ConfigFragment {
  return { role, source, stem: source, data }
}

describe("mergeRecords", () => {
  it("lets the left side win by default", () => {
    expect(mergeRecords({ port: 8080 }, { port: 3000, host: "localhost" })).toEqual({
      port: 8080,
      host: "localhost",
    })
  })

  it("lets the right side win under RIGHT_PRECEDENT", () => {
    expect(
      mergeRecords({ port: 8080 }, { port: 3000, host: "localhost" }, "RIGHT_PRECEDENT"),
    ).toEqual({ port: 3000, host: "localhost" })
  })

  it("merges nested mappings key by key", () => {
    const left = { db: { host: "db.internal" } }
    const right = { db: { host: "localhost", port: 5432 } }

    expect(mergeRecords(left, right)).toEqual({ db: { host: "db.internal", port: 5432 } })
  })

  it("replaces arrays wholesale", () => {
    expect(mergeRecords({ hosts: ["c"] }, { hosts: ["a", "b"] })).toEqual({ hosts: ["c"] })
  })

  it("replaces a mapping with a scalar from the winning side", () => {
    expect(mergeRecords({ cache: false }, { cache: { ttl: 60 } })).toEqual({ cache: false })
  })

  it("does not mutate its inputs", () => {
    const left = { db: { port: 5433 }, tags: ["x"] }
    const right = { db: { host: "localhost" }, tags: ["y"] }

    const { tags } = mergeRecords(left, right)
    if (Array.isArray(tags)) tags.push("z")

    expect(left).toEqual({ db: { port: 5433 }, tags: ["x"] })
    expect(right).toEqual({ db: { host: "localhost" }, tags: ["y"] })
  })

  it("keeps a class instance from the winning side as is", () => {
    const endpoint = new URL("https://db.internal:5432")

    expect(mergeRecords({ endpoint }, { endpoint: { host: "localhost" } }).endpoint).toBe(endpoint)
  })
})

describe("cloneRecord", () => {
  it("copies nested mappings and arrays, including mappings inside arrays", () => {
    const data = { db: { replicas: [{ host: "a" }] } }

    const copy = cloneRecord(data)
    data.db.replicas[0] = { host: "changed" }

    expect(copy).toEqual({ db: { replicas: [{ host: "a" }] } })
    expect(copy.db).not.toBe(data.db)
  })

  it("shares functions and class instances instead of copying them", () => {
    const onReady = () => 1
    const createdAt = new Date("2024-01-15T10:30:00.000Z")
    const endpoint = new URL("https://db.internal:5432")

    const copy = cloneRecord({ onReady, createdAt, endpoint, hooks: [onReady] })

    expect(copy.onReady).toBe(onReady)
    expect(copy.createdAt).toBe(createdAt)
    expect(copy.endpoint).toBe(endpoint)
    expect(copy.hooks).toEqual([onReady])
  })
})

describe("mergeFragments", () => {
  const defaults = fragment("default", "default.yaml", { this: "that", what: "yes", bar: "no" })

  it("lets more specific fragments win", () => {
    const { value } = mergeFragments([
      defaults,
      fragment("combination", "foo.all.all.json", { bar: "maybe" }),
      fragment("combination", "foo.foo.foo.json", { bar: "yes" }),
    ])

    expect(value).toEqual({ this: "that", what: "yes", bar: "yes" })
  })

  it("keeps the least specific value under RIGHT_PRECEDENT", () => {
    const { value, provenance } = mergeFragments(
      [defaults, fragment("combination", "foo.foo.foo.json", { bar: "yes", extra: 1 })],
      { behavior: "RIGHT_PRECEDENT" },
    )

    expect(value).toEqual({ this: "that", what: "yes", bar: "no", extra: 1 })
    expect(provenance.get("bar")).toBe("default.yaml")
    expect(provenance.get("extra")).toBe("foo.foo.foo.json")
  })

  it("records which fragment supplied each top-level key", () => {
    const { provenance } = mergeFragments([
      defaults,
      fragment("combination", "foo.foo.foo.json", { bar: "yes" }),
    ])

    expect(provenance.get("this")).toBe("default.yaml")
    expect(provenance.get("bar")).toBe("foo.foo.foo.json")
    expect(provenance.get("missing")).toBeUndefined()
  })

  it("collects declared keys from default fragments", () => {
    const { declaredKeys } = mergeFragments([
      fragment("default", "object:defaults", { region: "eu" }),
      defaults,
      fragment("combination", "foo.json", { other: true }),
    ])

    expect([...declaredKeys].sort()).toEqual(["bar", "region", "this", "what"])
  })

  it("returns an empty mapping for no fragments", () => {
    expect(mergeFragments([]).value).toEqual({})
  })

  describe("requireDefaults", () => {
    it("rejects a key the defaults do not declare", () => {
      const fragments = [defaults, fragment("combination", "foo.all.all.json", { baz: 1 })]

      expect(() => mergeFragments(fragments, { requireDefaults: true })).toThrow(
        'The "baz" key is not declared in the default config (found in foo.all.all.json)',
      )
    })

    it("names the key and source in the error context", () => {
      const fragments = [defaults, fragment("override", "override.json", { secret: "x" })]

      try {
        mergeFragments(fragments, { requireDefaults: true })
        expect.unreachable()
      } catch (err) {
        expect(isConfigError(err, "unknown_key")).toBe(true)
        expect(isConfigError(err) && err.context).toEqual({
          key: "secret",
          source: "override.json",
        })
      }
    })

    it("checks every non-default fragment before folding it", () => {
      const fragments = [
        defaults,
        fragment("combination", "a.json", { bar: "a" }),
        fragment("combination", "b.json", { baz: "b" }),
      ]

      expect(() => mergeFragments(fragments, { requireDefaults: true })).toThrow(
        'The "baz" key is not declared in the default config (found in b.json)',
      )
    })

    it("accepts fragments that only use declared keys", () => {
      const { value } = mergeFragments(
        [defaults, fragment("combination", "foo.json", { bar: "yes" })],
        { requireDefaults: true },
      )

      expect(value).toEqual({ this: "that", what: "yes", bar: "yes" })
    })

    it("checks top-level keys only", () => {
      const { value } = mergeFragments(
        [
          fragment("default", "default.json", { db: { host: "localhost" } }),
          fragment("combination", "prod.json", { db: { pool: 10 } }),
        ],
        { requireDefaults: true },
      )

      expect(value).toEqual({ db: { host: "localhost", pool: 10 } })
    })

    it("merges unknown keys when off", () => {
      const { value } = mergeFragments([
        defaults,
        fragment("combination", "foo.all.all.json", { baz: 1 }),
      ])

      expect(value).toEqual({ this: "that", what: "yes", bar: "no", baz: 1 })
    })
  })

  describe("overrideMode", () => {
    const fragments = [
      defaults,
      fragment("combination", "foo.json", { bar: "yes" }),
      fragment("override", "override.json", { what: "no" }),
    ]

    it("merges overrides as the most specific layer by default", () => {
      expect(mergeFragments(fragments).value).toEqual({ this: "that", what: "no", bar: "yes" })
    })

    it("uses the overrides alone under replace", () => {
      expect(mergeFragments(fragments, { overrideMode: "replace" }).value).toEqual({
        what: "no",
      })
    })

    it("falls back to the full fold under replace when no override exists", () => {
      const { value } = mergeFragments(fragments.slice(0, 2), { overrideMode: "replace" })

      expect(value).toEqual({ this: "that", what: "yes", bar: "yes" })
    })
  })
})
