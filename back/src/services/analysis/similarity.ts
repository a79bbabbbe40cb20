export { longestCommonBlock, matchingCharacters, similarityRatio }
export type { CommonBlock }

type CommonBlock = {
  aStart: number
  bStart: number
  size: number
}

/**
 * Longest common substring of a[aLo:aHi] and b[bLo:bHi]. Among equally long blocks the one
 * starting earliest in `a`, then earliest in `b`, wins.
 */
const longestCommonBlock = (
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): CommonBlock => {
  let best: CommonBlock = { aStart: aLo, bStart: bLo, size: 0 }
  let previous = new Map<number, number>()

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Map<number, number>()
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) continue
      const size = (previous.get(j - 1) ?? 0) + 1
      current.set(j, size)
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size }
      }
    }
    previous = current
  }

  return best
}

// Ratcliff/Obershelp: take the longest block, then recurse on both sides of it.
const matchingCharacters = (a: string, b: string): number => {
  let total = 0
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]]

  while (queue.length > 0) {
    const range = queue.pop()
    if (!range) break
    const [aLo, aHi, bLo, bHi] = range
    const block = longestCommonBlock(a, b, aLo, aHi, bLo, bHi)
    if (block.size === 0) continue

    total += block.size
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart])
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      queue.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi])
    }
  }

  return total
}

/** 2·M / (|a| + |b|) in [0, 1]; two empty strings are identical. */
const similarityRatio = (a: string, b: string): number => {
  const length = a.length + b.length
  if (length === 0) return 1
  return (2 * matchingCharacters(a, b)) / length
}
