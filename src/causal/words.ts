export interface Word {
  text: string
  start: number
  end: number
}

export function splitWords(text: string): Word[] {
  const words: Word[] = []
  const regex = /\S+/g
  let match: RegExpExecArray | null
  while ((match = regex.exec(text))) {
    words.push({ text: match[0], start: match.index, end: match.index + match[0].length })
  }
  return words
}

export function wordOffsetsOf(text: string): number[] {
  return splitWords(text).map((w) => w.start)
}

/** Index of the word containing `charOffset`, given ascending word start offsets. -1 before the first word. */
export function wordIndexAtChar(wordOffsets: readonly number[], charOffset: number): number {
  let lo = 0
  let hi = wordOffsets.length - 1
  let found = -1
  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    if (wordOffsets[mid] <= charOffset) {
      found = mid
      lo = mid + 1
    } else {
      hi = mid - 1
    }
  }
  return found
}
