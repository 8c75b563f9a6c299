// CHANGE: split input text into lines for the lines command
// WHY: a final newline must not produce a phantom empty element
// REF: req-cli-lines-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: join(splitLines(t), "\n") + (t ends with newline ? "\n" : "") = normalize(t)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no returned line contains "\n"; "\r\n" counts as one break
// COMPLEXITY: O(n)/O(n)

export const splitLines = (text: string): ReadonlyArray<string> => {
  if (text.length === 0) {
    return []
  }
  const lines = text.split(/\r?\n/u)
  return lines[lines.length - 1] === "" ? lines.slice(0, -1) : lines
}
