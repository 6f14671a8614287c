import { BTreeMap } from "./orderedMap.js"

describe("B-tree maps should keep keys in order", () => {
  it("Should iterate in comparator order regardless of insertion order", () => {
    const map = new BTreeMap<number, string>((l, r) => l - r)

    for (const n of [5, 1, 9, 3, 7]) {
      expect(map.set(n, `v${n}`)).toBeTruthy()
    }

    expect(map.size).toBe(5)
    expect(Array.from(map.keys())).toEqual([1, 3, 5, 7, 9])
    expect(Array.from(map.values())).toEqual(["v1", "v3", "v5", "v7", "v9"])
    expect(Array.from(map)).toEqual([
      [1, "v1"],
      [3, "v3"],
      [5, "v5"],
      [7, "v7"],
      [9, "v9"],
    ])
  })

  it("Should replace values for existing keys", () => {
    const map = new BTreeMap<string, number>((l, r) =>
      l < r ? -1 : l > r ? 1 : 0,
    )

    expect(map.set("b", 1)).toBeTruthy()
    expect(map.set("a", 2)).toBeTruthy()
    expect(map.set("b", 3)).toBeFalsy()

    expect(map.size).toBe(2)
    expect(map.get("b")).toBe(3)
    expect(map.get("c")).toBeUndefined()
    expect(map.has("a")).toBeTruthy()
    expect(map.has("z")).toBeFalsy()
  })

  it("Should use the comparator for equality", () => {
    // Case insensitive keys collapse
    const map = new BTreeMap<string, number>((l, r) =>
      l.toLowerCase().localeCompare(r.toLowerCase()),
    )

    map.set("Key", 1)
    expect(map.set("KEY", 2)).toBeFalsy()
    expect(Array.from(map.entries())).toEqual([["Key", 2]])
  })

  it("Should stay ordered across many node splits", () => {
    const map = new BTreeMap<number, number>((l, r) => l - r)
    const count = 5003

    // 7919 is coprime with 5003 so this visits every key once out of order
    for (let n = 0; n < count; ++n) {
      const key = (n * 7919) % count
      expect(map.set(key, key * 2)).toBeTruthy()
    }

    expect(map.size).toBe(count)
    expect(map.set(2500, -1)).toBeFalsy()
    expect(map.size).toBe(count)

    const keys = Array.from(map.keys())
    expect(keys).toHaveLength(count)
    expect(keys.every((k, idx) => k === idx)).toBeTruthy()

    expect(map.get(0)).toBe(0)
    expect(map.get(2500)).toBe(-1)
    expect(map.get(count - 1)).toBe((count - 1) * 2)
    expect(map.get(count)).toBeUndefined()
    expect(map.has(-1)).toBeFalsy()
  })
})
