// CHANGE: define the append-only character sink the engine writes to
// WHY: the engine must not care whether text lands in memory, a file, or a stream
// REF: req-sink-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: contents(append(s, c)) = contents(s) + c
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: append never reorders or drops chunks
// COMPLEXITY: O(1) amortized per append

export interface Sink {
  /** May throw; the engine lets the failure propagate unchanged. */
  readonly append: (chunk: string) => void
}

export interface StringSink extends Sink {
  readonly toString: () => string
}

/**
 * In-memory sink collecting chunks until read.
 *
 * @pure false
 * @invariant toString() returns every appended chunk in order
 * @complexity O(n) for toString
 */
export const makeStringSink = (): StringSink => {
  const chunks: Array<string> = []
  return {
    append: (chunk) => {
      chunks.push(chunk)
    },
    toString: () => chunks.join("")
  }
}
