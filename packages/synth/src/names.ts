import { z } from 'zod'
import countyNames from '../data/county-names.json'
import { ConfigurationError } from './errors'
import { pick, type Rng } from './random'

export type PersonName = {
  firstName: string
  lastName: string
}

/**
 * Region-conditioned name source injected into the customer synthesizer.
 * `nameForRegion` must throw for a region it does not know.
 */
export interface NameProvider {
  regions(): readonly string[]
  nameForRegion(region: string): PersonName
}

const nameListSchema = z.array(z.string().min(1)).min(1)

export const regionNameTableSchema = z.record(
  z.object({
    firstNames: nameListSchema,
    lastNames: nameListSchema,
  }),
)

export type RegionNameTable = z.infer<typeof regionNameTableSchema>

export function createRegionNameProvider(table: RegionNameTable, rng: Rng): NameProvider {
  const regions = Object.keys(table)

  return {
    regions: () => regions,
    nameForRegion(region: string): PersonName {
      const entry = Object.hasOwn(table, region) ? table[region] : undefined
      if (!entry) {
        throw new ConfigurationError(`Unknown region "${region}" for name generation`)
      }
      return {
        firstName: pick(rng, entry.firstNames),
        lastName: pick(rng, entry.lastNames),
      }
    },
  }
}

/** Kenyan counties bundled with the package. */
export function loadCountyNameTable(): RegionNameTable {
  return regionNameTableSchema.parse(countyNames)
}
