export interface RandomSource {
  // Returns a number in [0, 1)
  next(): number
}

// Mulberry32 - simple seeded PRNG
export class SeededRandom implements RandomSource {
  private state: number

  constructor(readonly seed: number) {
    this.state = seed
  }

  // Returns a random number between 0 and 1
  next(): number {
    this.state |= 0
    this.state = (this.state + 0x6d2b79f5) | 0
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  // Returns a random integer between min (inclusive) and max (exclusive)
  nextInt(min: number, max: number): number {
    return randomInt(this, min, max)
  }
}

export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min)) + min
}

// Uniform choice; an empty list has nothing to pick
export function pick<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined
  return items[Math.min(randomInt(random, 0, items.length), items.length - 1)]
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 1000000)
}
