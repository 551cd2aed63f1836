import type * as Option from "effect/Option"

import * as Access from "./access.js"
import { badAccess } from "./errors.js"
import type { OrderedEntry, OrderedMap } from "./ordered-map.js"
import type { JsonArray, JsonKind, JsonObject, JsonValue } from "./value.js"
import { cloneValue, makeArray, makeNull, makeObject, undefinedNode } from "./value.js"

// CHANGE: add a write-capable cursor into a JsonValue tree
// WHY: `doc.at("a").at(2).set(v)` must create missing members and grow arrays on assignment only
// REF: req-node-ref-1
// FORMAT THEOREM: ∀r,v: r.set(v) ⇒ valueEquals(r.value, v) ∧ r.value ≠ v (deep copy)
// PURITY: CORE (mutates the tree it points into)
// EFFECT: set throws BadAccess through Nowhere, a scalar parent, or a detached slot
// INVARIANT: reads never throw and never mutate; only set materializes pending slots
// COMPLEXITY: at/set O(1) for arrays, O(n) for object keys

/** Mutable cell owning a root value. */
export interface ValueHolder {
  value: JsonValue
}

type Slot =
  | { readonly _tag: "Root"; readonly holder: ValueHolder }
  | { readonly _tag: "Element"; readonly parent: NodeRef; readonly array: JsonArray; readonly index: number }
  | {
    readonly _tag: "Entry"
    readonly parent: NodeRef
    readonly members: OrderedMap<JsonValue>
    readonly entry: OrderedEntry<JsonValue>
  }

type RefTarget =
  | { readonly _tag: "Nowhere" }
  | { readonly _tag: "Real"; readonly slot: Slot }
  | { readonly _tag: "PendingIndex"; readonly parent: NodeRef; readonly index: number }
  | { readonly _tag: "PendingKey"; readonly parent: NodeRef; readonly key: string }

export type RefState = "Nowhere" | "Real" | "Pending"

const nowhere: RefTarget = { _tag: "Nowhere" }

/** A child slot stays usable only while its parent still holds the same container and entry. */
const isAttached = (slot: Slot): boolean => {
  switch (slot._tag) {
    case "Root":
      return true
    case "Element":
      return slot.parent.value === slot.array
    case "Entry": {
      const current = slot.parent.value
      return current._tag === "Object" && current.members === slot.members &&
        slot.members.find(slot.entry.key) === slot.entry
    }
  }
}

const readSlot = (slot: Slot): JsonValue => {
  if (!isAttached(slot)) {
    return undefinedNode
  }
  switch (slot._tag) {
    case "Root":
      return slot.holder.value
    case "Element":
      return slot.array.items[slot.index] ?? undefinedNode
    case "Entry":
      return slot.entry.value
  }
}

/** Store `value` at `index`, padding any gap with nulls. */
const placeAt = (array: JsonArray, index: number, value: JsonValue): void => {
  while (array.items.length < index) {
    array.items.push(makeNull())
  }
  array.items[index] = value
}

const writeSlot = (slot: Slot, value: JsonValue): void => {
  if (!isAttached(slot)) {
    throw badAccess("cannot assign through a reference detached from its parent")
  }
  switch (slot._tag) {
    case "Root":
      slot.holder.value = value
      return
    case "Element":
      placeAt(slot.array, slot.index, value)
      return
    case "Entry":
      slot.entry.value = value
      return
  }
}

const isValidIndex = (index: number): boolean => Number.isInteger(index) && index >= 0

const pendingTarget = (parent: NodeRef, selector: number | string): RefTarget => {
  if (typeof selector === "string") {
    return { _tag: "PendingKey", parent, key: selector }
  }
  return isValidIndex(selector) ? { _tag: "PendingIndex", parent, index: selector } : nowhere
}

const childTarget = (parent: NodeRef, value: JsonValue, selector: number | string): RefTarget => {
  switch (value._tag) {
    case "Undefined":
      return pendingTarget(parent, selector)
    case "Array": {
      if (typeof selector !== "number" || !isValidIndex(selector)) {
        return nowhere
      }
      return selector < value.items.length
        ? { _tag: "Real", slot: { _tag: "Element", parent, array: value, index: selector } }
        : { _tag: "PendingIndex", parent, index: selector }
    }
    case "Object": {
      if (typeof selector !== "string") {
        return nowhere
      }
      const entry = value.members.find(selector)
      return entry === undefined
        ? { _tag: "PendingKey", parent, key: selector }
        : { _tag: "Real", slot: { _tag: "Entry", parent, members: value.members, entry } }
    }
    default:
      return nowhere
  }
}

/**
 * Short-lived reference to a node, or to the place a node would go.
 *
 * A reference into an array element keeps its index: erasing an earlier
 * element through another reference shifts what it points at. Once its parent
 * is replaced or its entry erased, it reads as undefined and refuses writes.
 */
export class NodeRef {
  private constructor(private target: RefTarget) {}

  /** Reference owning `holder` as its root slot. */
  static fromHolder(holder: ValueHolder): NodeRef {
    return new NodeRef({ _tag: "Real", slot: { _tag: "Root", holder } })
  }

  /** Reference rooted at `value`; children are edited in place, a root `set` only rebinds the reference. */
  static of(value: JsonValue): NodeRef {
    return NodeRef.fromHolder({ value })
  }

  get state(): RefState {
    switch (this.target._tag) {
      case "Nowhere":
        return "Nowhere"
      case "Real":
        return "Real"
      case "PendingIndex":
      case "PendingKey":
        return "Pending"
    }
  }

  /**
   * The referenced node. A pending reference reads whatever its parent holds at that
   * place now, which is the undefined sentinel until something is assigned there.
   */
  get value(): JsonValue {
    switch (this.target._tag) {
      case "Nowhere":
        return undefinedNode
      case "Real":
        return readSlot(this.target.slot)
      case "PendingIndex":
        return Access.lookup(this.target.parent.value, this.target.index)
      case "PendingKey":
        return Access.lookup(this.target.parent.value, this.target.key)
    }
  }

  get kind(): JsonKind {
    return this.value._tag
  }

  isDefined(): boolean {
    return Access.isDefined(this.value)
  }

  get size(): number {
    return Access.sizeOf(this.value)
  }

  at(selector: number | string): NodeRef {
    switch (this.target._tag) {
      case "Nowhere":
        return new NodeRef(nowhere)
      case "Real":
        return new NodeRef(childTarget(this, this.value, selector))
      case "PendingIndex":
      case "PendingKey":
        return new NodeRef(pendingTarget(this, selector))
    }
  }

  /**
   * Store a deep copy of `value` here, creating the slot if it is pending.
   *
   * @throws BadAccess through a nowhere or detached reference, or when a parent holds a scalar.
   * @invariant a second set through the same reference replaces in place
   */
  set(value: JsonValue): this {
    this.assign(cloneValue(value))
    return this
  }

  /**
   * Remove the referenced array element or object entry from its parent.
   *
   * @returns false when there is nothing to remove.
   */
  erase(): boolean {
    if (this.target._tag !== "Real") {
      return false
    }
    const slot = this.target.slot
    if (!isAttached(slot)) {
      return false
    }
    switch (slot._tag) {
      case "Root":
        return false
      case "Element": {
        if (slot.index >= slot.array.items.length) {
          return false
        }
        slot.array.items.splice(slot.index, 1)
        this.target = nowhere
        return true
      }
      case "Entry": {
        const removed = slot.members.eraseEntry(slot.entry)
        this.target = nowhere
        return removed
      }
    }
  }

  private assign(value: JsonValue): void {
    const target = this.target
    switch (target._tag) {
      case "Nowhere":
        throw badAccess("cannot assign through a reference to nowhere")
      case "Real":
        writeSlot(target.slot, value)
        return
      case "PendingIndex": {
        const array = target.parent.materializeArray()
        placeAt(array, target.index, value)
        this.target = { _tag: "Real", slot: { _tag: "Element", parent: target.parent, array, index: target.index } }
        return
      }
      case "PendingKey": {
        const object = target.parent.materializeObject()
        const [entry] = object.members.insertOrAssign(target.key, value)
        this.target = { _tag: "Real", slot: { _tag: "Entry", parent: target.parent, members: object.members, entry } }
        return
      }
    }
  }

  private materializeArray(): JsonArray {
    const current = this.value
    if (current._tag === "Array") {
      return current
    }
    if (current._tag !== "Undefined") {
      throw badAccess(`cannot index into ${current._tag} with a number`)
    }
    const created = makeArray()
    this.assign(created)
    return created
  }

  private materializeObject(): JsonObject {
    const current = this.value
    if (current._tag === "Object") {
      return current
    }
    if (current._tag !== "Undefined") {
      throw badAccess(`cannot index into ${current._tag} with a key`)
    }
    const created = makeObject()
    this.assign(created)
    return created
  }

  isNull(): boolean {
    return Access.isNull(this.value)
  }
  isBoolean(): boolean {
    return Access.isBoolean(this.value)
  }
  isInteger(): boolean {
    return Access.isInteger(this.value)
  }
  isFloat(): boolean {
    return Access.isFloat(this.value)
  }
  isNumber(): boolean {
    return Access.isNumber(this.value)
  }
  isString(): boolean {
    return Access.isString(this.value)
  }
  isArray(): boolean {
    return Access.isArray(this.value)
  }
  isObject(): boolean {
    return Access.isObject(this.value)
  }

  getNull(): null {
    return Access.getNull(this.value)
  }
  getBoolean(): boolean {
    return Access.getBoolean(this.value)
  }
  getInteger(): bigint {
    return Access.getInteger(this.value)
  }
  getFloat(): number {
    return Access.getFloat(this.value)
  }
  getNumber(): number {
    return Access.getNumber(this.value)
  }
  getString(): string {
    return Access.getString(this.value)
  }
  getArray(): Array<JsonValue> {
    return Access.getArray(this.value)
  }
  getObject(): OrderedMap<JsonValue> {
    return Access.getObject(this.value)
  }

  getBooleanOr(fallback: boolean): boolean {
    return Access.getBooleanOr(this.value, fallback)
  }
  getIntegerOr(fallback: bigint): bigint {
    return Access.getIntegerOr(this.value, fallback)
  }
  getFloatOr(fallback: number): number {
    return Access.getFloatOr(this.value, fallback)
  }
  getNumberOr(fallback: number): number {
    return Access.getNumberOr(this.value, fallback)
  }
  getStringOr(fallback: string): string {
    return Access.getStringOr(this.value, fallback)
  }
  getArrayOr(fallback: Array<JsonValue>): Array<JsonValue> {
    return Access.getArrayOr(this.value, fallback)
  }
  getObjectOr(fallback: OrderedMap<JsonValue>): OrderedMap<JsonValue> {
    return Access.getObjectOr(this.value, fallback)
  }

  asBoolean(): Option.Option<boolean> {
    return Access.asBoolean(this.value)
  }
  asInteger(): Option.Option<bigint> {
    return Access.asInteger(this.value)
  }
  asFloat(): Option.Option<number> {
    return Access.asFloat(this.value)
  }
  asNumber(): Option.Option<number> {
    return Access.asNumber(this.value)
  }
  asString(): Option.Option<string> {
    return Access.asString(this.value)
  }
  asArray(): Option.Option<Array<JsonValue>> {
    return Access.asArray(this.value)
  }
  asObject(): Option.Option<OrderedMap<JsonValue>> {
    return Access.asObject(this.value)
  }
}
