/**
 * Shuffle strategies used by formation.
 *
 * Formation takes a `Shuffler` as a parameter so tests can pass
 * `identityShuffler` and get a deterministic result.
 */

import { randomInt } from "node:crypto"
import { ShuffleError } from "./errors.js"

/**
 * Reorders a sequence in place.
 */
export interface Shuffler {
  shuffle: <T>(items: Array<T>) => void
}

export type ShuffleStrategy = `none` | `random`

export const SHUFFLE_STRATEGIES: ReadonlyArray<ShuffleStrategy> = [
  `none`,
  `random`,
]

/**
 * Leaves the sequence as it is.
 */
export const identityShuffler: Shuffler = {
  shuffle: () => {},
}

/**
 * Fisher–Yates over the process-wide CSPRNG. Every call draws fresh
 * randomness, so no two calls depend on each other.
 */
export const randomShuffler: Shuffler = {
  shuffle: <T>(items: Array<T>) => {
    for (let i = items.length - 1; i > 0; i--) {
      let j: number
      try {
        j = randomInt(i + 1)
      } catch (error) {
        throw new ShuffleError(error)
      }
      ;[items[i], items[j]] = [items[j], items[i]]
    }
  },
}

export function isShuffleStrategy(value: string): value is ShuffleStrategy {
  return SHUFFLE_STRATEGIES.some((strategy) => strategy === value)
}

export function getShuffler(strategy: ShuffleStrategy): Shuffler {
  switch (strategy) {
    case `none`:
      return identityShuffler
    case `random`:
      return randomShuffler
  }
}
