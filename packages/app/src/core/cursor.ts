import type { SourcePosition } from "./errors.js"
import { badFormat } from "./errors.js"

// CHANGE: single-character lookahead over string, chunked or byte input
// WHY: the parser reads one code unit ahead and reports 1-based line/column
// REF: req-cursor-1
// PURITY: CORE (stateful reader)
// EFFECT: byte input that is not valid UTF-8 throws BadFormat on construction
// INVARIANT: position always names the lookahead code unit
// COMPLEXITY: O(1) amortized per code unit

export const EOF = -1

export type JsonInput = string | Uint8Array | Iterable<string>

const strictDecoder = (): InstanceType<typeof TextDecoder> => new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const isValidPrefix = (bytes: Uint8Array, length: number): boolean => {
  try {
    strictDecoder().decode(bytes.subarray(0, length), { stream: true })
    return true
  } catch (error) {
    if (error instanceof TypeError) {
      return false
    }
    throw error
  }
}

/** 1-based position just past `text`, counted in code units like the cursor. */
const positionAfter = (text: string): SourcePosition => {
  const lastBreak = text.lastIndexOf("\n")
  return {
    line: text.split("\n").length,
    column: text.length - lastBreak
  }
}

/** Longest prefix that decodes, a truncated sequence at its end allowed; binary search. */
const validPrefixLength = (bytes: Uint8Array): number => {
  let low = 0
  let high = bytes.length
  while (low < high) {
    const middle = Math.ceil((low + high) / 2)
    if (isValidPrefix(bytes, middle)) {
      low = middle
    } else {
      high = middle - 1
    }
  }
  return low
}

/**
 * Decode UTF-8 without replacement characters.
 *
 * @throws BadFormat at the first byte that is not part of a valid sequence.
 */
const decodeBytes = (bytes: Uint8Array): string => {
  try {
    return strictDecoder().decode(bytes)
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error
    }
    const valid = strictDecoder().decode(bytes.subarray(0, validPrefixLength(bytes)), { stream: true })
    throw badFormat("invalid UTF-8 sequence", positionAfter(valid))
  }
}

export class SourceCursor {
  private chunk: string
  private offset = 0
  private pending: Iterator<string> | undefined
  private line = 0
  private column = 0

  constructor(input: JsonInput) {
    if (typeof input === "string") {
      this.chunk = input
      this.pending = undefined
    } else if (input instanceof Uint8Array) {
      this.chunk = decodeBytes(input)
      this.pending = undefined
    } else {
      this.chunk = ""
      this.pending = input[Symbol.iterator]()
    }
  }

  /** Code unit under the cursor, or EOF. */
  peek(): number {
    while (this.offset >= this.chunk.length) {
      if (this.pending === undefined) {
        return EOF
      }
      const next = this.pending.next()
      if (next.done === true) {
        this.pending = undefined
        return EOF
      }
      this.chunk = next.value
      this.offset = 0
    }
    return this.chunk.charCodeAt(this.offset)
  }

  /** Consume and return the lookahead. EOF is never consumed. */
  eat(): number {
    const code = this.peek()
    if (code === EOF) {
      return EOF
    }
    this.offset += 1
    if (code === 0x0a) {
      this.line += 1
      this.column = 0
    } else {
      this.column += 1
    }
    return code
  }

  /** Consume the lookahead only when it equals `code`. */
  eatIf(code: number): boolean {
    if (this.peek() !== code) {
      return false
    }
    this.eat()
    return true
  }

  position(): SourcePosition {
    return { line: this.line + 1, column: this.column + 1 }
  }
}
