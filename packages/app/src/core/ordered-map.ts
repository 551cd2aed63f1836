import * as Equivalence from "effect/Equivalence"

// CHANGE: add an insertion-ordered key/value container for JSON objects
// WHY: object member order is significant and must survive parse → serialize
// REF: req-ordered-map-1
// FORMAT THEOREM: ∀m,k,v: keys(insertOrAssign(m,k,v)) = keys(m) if k ∈ keys(m) else keys(m) ++ [k]
// PURITY: CORE (mutable container, no IO)
// INVARIANT: keys are unique under the map's equivalence
// COMPLEXITY: O(n) lookup/insert/erase, O(1) positional access

export interface OrderedEntry<V> {
  readonly key: string
  value: V
}

/**
 * Sequence of unique-key entries, searched linearly.
 *
 * Entries are stable objects: holding an entry keeps pointing at the same
 * member while other keys are inserted, which is what node references rely on.
 */
export class OrderedMap<V> implements Iterable<OrderedEntry<V>> {
  private readonly items: Array<OrderedEntry<V>> = []

  constructor(readonly keyEquals: Equivalence.Equivalence<string> = Equivalence.string) {}

  static from<V>(
    pairs: Iterable<readonly [string, V]>,
    keyEquals: Equivalence.Equivalence<string> = Equivalence.string
  ): OrderedMap<V> {
    const map = new OrderedMap<V>(keyEquals)
    for (const [key, value] of pairs) {
      map.insertOrAssign(key, value)
    }
    return map
  }

  get size(): number {
    return this.items.length
  }

  indexOf(key: string): number {
    for (let index = 0; index < this.items.length; index++) {
      const entry = this.items[index]
      if (entry !== undefined && this.keyEquals(entry.key, key)) {
        return index
      }
    }
    return -1
  }

  find(key: string): OrderedEntry<V> | undefined {
    const index = this.indexOf(key)
    return index === -1 ? undefined : this.items[index]
  }

  has(key: string): boolean {
    return this.indexOf(key) !== -1
  }

  get(key: string): V | undefined {
    return this.find(key)?.value
  }

  at(index: number): OrderedEntry<V> | undefined {
    return this.items[index]
  }

  /**
   * Append `key` unless it is already present.
   *
   * @returns The entry holding `key` and whether it was appended.
   */
  insert(key: string, value: V): readonly [OrderedEntry<V>, boolean] {
    const existing = this.find(key)
    if (existing !== undefined) {
      return [existing, false]
    }
    const entry: OrderedEntry<V> = { key, value }
    this.items.push(entry)
    return [entry, true]
  }

  /**
   * Replace the value of `key` in place, or append it when absent.
   *
   * @returns The entry holding `key` and whether it was appended.
   *
   * @invariant position of an existing key is unchanged
   */
  insertOrAssign(key: string, value: V): readonly [OrderedEntry<V>, boolean] {
    const existing = this.find(key)
    if (existing !== undefined) {
      existing.value = value
      return [existing, false]
    }
    const entry: OrderedEntry<V> = { key, value }
    this.items.push(entry)
    return [entry, true]
  }

  erase(key: string): boolean {
    const index = this.indexOf(key)
    if (index === -1) {
      return false
    }
    this.items.splice(index, 1)
    return true
  }

  eraseAt(index: number): boolean {
    if (index < 0 || index >= this.items.length) {
      return false
    }
    this.items.splice(index, 1)
    return true
  }

  /** Remove `entry` itself (identity, not key). */
  eraseEntry(entry: OrderedEntry<V>): boolean {
    return this.eraseAt(this.items.indexOf(entry))
  }

  clear(): void {
    this.items.length = 0
  }

  keys(): Array<string> {
    return this.items.map((entry) => entry.key)
  }

  values(): Array<V> {
    return this.items.map((entry) => entry.value)
  }

  entries(): Array<readonly [string, V]> {
    return this.items.map((entry) => [entry.key, entry.value] as const)
  }

  map<W>(f: (value: V, key: string) => W): OrderedMap<W> {
    const result = new OrderedMap<W>(this.keyEquals)
    for (const entry of this.items) {
      result.items.push({ key: entry.key, value: f(entry.value, entry.key) })
    }
    return result
  }

  [Symbol.iterator](): Iterator<OrderedEntry<V>> {
    return this.items[Symbol.iterator]()
  }
}
