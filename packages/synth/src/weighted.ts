import { ConfigurationError } from './errors'
import type { Rng } from './random'

export type WeightedSampler<T> = {
  readonly size: number
  readonly totalWeight: number
  draw: (rng: Rng) => T
}

/**
 * Weighted draw with replacement over an explicit weight vector.
 *
 * Cumulative weights are built once; each draw is a binary search. Items with
 * weight 0 occupy an empty interval and are never returned.
 */
export function createWeightedSampler<T>(items: readonly T[], weights: readonly number[]): WeightedSampler<T> {
  if (items.length === 0) {
    throw new ConfigurationError('Weighted sampler needs at least one item')
  }
  if (items.length !== weights.length) {
    throw new ConfigurationError(
      `Weighted sampler got ${items.length} items but ${weights.length} weights`,
    )
  }

  const cumulative: number[] = []
  let total = 0
  weights.forEach((weight, index) => {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError(`Invalid weight ${weight} at index ${index}`)
    }
    total += weight
    cumulative.push(total)
  })

  if (total <= 0) {
    throw new ConfigurationError('Weighted sampler needs a positive total weight')
  }

  return {
    size: items.length,
    totalWeight: total,
    draw(rng: Rng): T {
      const target = rng() * total
      let low = 0
      let high = cumulative.length - 1
      while (low < high) {
        const mid = (low + high) >>> 1
        if (cumulative[mid] > target) {
          high = mid
        } else {
          low = mid + 1
        }
      }
      return items[low]
    },
  }
}

export type TierWeightOptions = {
  /** Highest id that still belongs to the staple tier. */
  stapleCutoff: number
  stapleWeight: number
  standardWeight: number
}

export function tieredWeights(ids: readonly number[], options: TierWeightOptions): number[] {
  return ids.map((id) => (id <= options.stapleCutoff ? options.stapleWeight : options.standardWeight))
}
