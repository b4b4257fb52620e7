import { nestedCombinations } from "../nested"

describe("nestedCombinations", () => {
  describe("with a wildcard", () => {
    it("swaps each value for the wildcard in odometer order", () => {
      const combinations = nestedCombinations(["db", "1", "qa"], "all")

      expect(combinations.map((c) => c.join("."))).toEqual([
        "all.all.all",
        "all.all.qa",
        "all.1.all",
        "all.1.qa",
        "db.all.all",
        "db.all.qa",
        "db.1.all",
        "db.1.qa",
      ])
    })

    it("yields 2^N combinations from all-wildcard to all-values", () => {
      const identity = ["web", "3", "eu", "prod"]
      const combinations = nestedCombinations(identity, "all")

      expect(combinations).toHaveLength(16)
      expect(combinations[0]).toEqual(["all", "all", "all", "all"])
      expect(combinations[15]).toEqual(identity)
    })

    it("keeps every combination at full length", () => {
      const combinations = nestedCombinations(["a", "b", "c"], "*")

      for (const combination of combinations) {
        expect(combination).toHaveLength(3)
      }
    })

    it("uses a custom wildcard token", () => {
      expect(nestedCombinations(["a"], "_")).toEqual([["_"], ["a"]])
    })

    it("yields a single empty combination for an empty identity", () => {
      expect(nestedCombinations([], "all")).toEqual([[]])
    })
  })

  describe("without a wildcard", () => {
    it("drops wildcard slots and the empty combination", () => {
      expect(nestedCombinations(["a", "b", "c"], null)).toEqual([
        ["c"],
        ["b"],
        ["b", "c"],
        ["a"],
        ["a", "c"],
        ["a", "b"],
        ["a", "b", "c"],
      ])
    })

    it("does not de-duplicate shortened combinations", () => {
      expect(nestedCombinations(["foo", "foo"], null)).toEqual([
        ["foo"],
        ["foo"],
        ["foo", "foo"],
      ])
    })

    it("yields nothing for an empty identity", () => {
      expect(nestedCombinations([], null)).toEqual([])
    })
  })
})
