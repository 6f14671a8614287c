/**
 * Ordered associative container backed by a B-tree
 */

import type { Comparator, Optional } from "../type/utils.js"

/**
 * A map that keeps its keys sorted by a {@link Comparator}
 */
export interface OrderedMap<K, V> extends Iterable<[K, V]> {
  /** The number of entries in the map */
  readonly size: number

  /**
   * Check to see if the key is in the map
   *
   * @param key The key to locate
   * @returns True if the key exists
   */
  has(key: K): boolean

  /**
   * Retrieve the value stored at the key
   *
   * @param key The key to locate
   * @returns The value associated with the key if it exists
   */
  get(key: K): Optional<V>

  /**
   * Set the value at the given key, replacing any existing value
   *
   * @param key The key to store with
   * @param value The value to store at that location
   * @returns True if the key was new
   */
  set(key: K, value: V): boolean

  /** Keys in ascending order */
  keys(): IterableIterator<K>

  /** Values in ascending key order */
  values(): IterableIterator<V>

  /** Entries in ascending key order */
  entries(): IterableIterator<[K, V]>
}

/** Minimum degree, nodes hold between DEGREE - 1 and 2 * DEGREE - 1 keys */
const DEGREE = 32
const MAX_KEYS = 2 * DEGREE - 1

interface BTreeNode<K, V> {
  keys: K[]
  values: V[]
  /** Empty for leaves, otherwise one more than the number of keys */
  children: BTreeNode<K, V>[]
}

function createNode<K, V>(): BTreeNode<K, V> {
  return { keys: [], values: [], children: [] }
}

/**
 * {@link OrderedMap} backed by a B-tree, so lookups and inserts are
 * O(log n) and iteration is an in-order walk
 */
export class BTreeMap<K, V> implements OrderedMap<K, V> {
  private readonly _compare: Comparator<K>
  private _root: BTreeNode<K, V> = createNode()
  private _size = 0

  constructor(compare: Comparator<K>) {
    this._compare = compare
  }

  get size(): number {
    return this._size
  }

  has(key: K): boolean {
    return this._find(key) !== undefined
  }

  get(key: K): Optional<V> {
    const found = this._find(key)
    return found ? found.node.values[found.idx] : undefined
  }

  set(key: K, value: V): boolean {
    const found = this._find(key)
    if (found) {
      found.node.values[found.idx] = value
      return false
    }

    // Split a full root before descending so every parent has room
    if (this._root.keys.length === MAX_KEYS) {
      const root = createNode<K, V>()
      root.children.push(this._root)
      this._split(root, 0)
      this._root = root
    }

    let node = this._root
    for (;;) {
      let idx = ~this._search(node, key)
      if (node.children.length === 0) {
        node.keys.splice(idx, 0, key)
        node.values.splice(idx, 0, value)
        break
      }

      if (node.children[idx].keys.length === MAX_KEYS) {
        this._split(node, idx)
        if (this._compare(key, node.keys[idx]) > 0) {
          idx++
        }
      }

      node = node.children[idx]
    }

    this._size++
    return true
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) {
      yield key
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value
    }
  }

  entries(): IterableIterator<[K, V]> {
    return walk(this._root)
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  private _find(key: K): Optional<{ node: BTreeNode<K, V>; idx: number }> {
    let node = this._root
    for (;;) {
      const idx = this._search(node, key)
      if (idx >= 0) {
        return { node, idx }
      }

      if (node.children.length === 0) {
        return
      }

      node = node.children[~idx]
    }
  }

  /**
   * Move the upper half of the full child at idx into a new sibling and lift
   * its median into the parent
   */
  private _split(parent: BTreeNode<K, V>, idx: number): void {
    const child = parent.children[idx]
    const sibling: BTreeNode<K, V> = {
      keys: child.keys.splice(DEGREE),
      values: child.values.splice(DEGREE),
      children: child.children.length > 0 ? child.children.splice(DEGREE) : [],
    }

    // After the splice the median is the last key left in the child
    const medianKey = child.keys.splice(DEGREE - 1, 1)
    const medianValue = child.values.splice(DEGREE - 1, 1)

    parent.keys.splice(idx, 0, ...medianKey)
    parent.values.splice(idx, 0, ...medianValue)
    parent.children.splice(idx + 1, 0, sibling)
  }

  /**
   * Binary search for the key within a single node
   *
   * @param node The node to search
   * @param key The key to locate
   * @returns The index of the key or the bitwise complement of where it
   * would be inserted
   */
  private _search(node: BTreeNode<K, V>, key: K): number {
    let low = 0
    let high = node.keys.length - 1

    while (low <= high) {
      const mid = (low + high) >>> 1
      const cmp = this._compare(node.keys[mid], key)
      if (cmp < 0) {
        low = mid + 1
      } else if (cmp > 0) {
        high = mid - 1
      } else {
        return mid
      }
    }

    return ~low
  }
}

function* walk<K, V>(node: BTreeNode<K, V>): IterableIterator<[K, V]> {
  const leaf = node.children.length === 0
  for (let n = 0; n < node.keys.length; ++n) {
    if (!leaf) {
      yield* walk(node.children[n])
    }
    yield [node.keys[n], node.values[n]]
  }

  if (!leaf) {
    yield* walk(node.children[node.keys.length])
  }
}
