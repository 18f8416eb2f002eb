import { z } from 'zod'
import localityData from '../data/localities.json'

export const regionDataSchema = z.object({
  localities: z.record(z.array(z.string().min(1))),
  defaultLocalities: z.array(z.string().min(1)).min(1),
  postalCodes: z.array(z.string().regex(/^\d{5}$/)).min(1),
})

export type RegionData = z.infer<typeof regionDataSchema>

export function loadKenyanRegionData(): RegionData {
  return regionDataSchema.parse(localityData)
}

/** Configured localities for a region, or the defaults when it has none. */
export function localitiesFor(data: RegionData, region: string): readonly string[] {
  const configured = Object.hasOwn(data.localities, region) ? data.localities[region] : undefined
  return configured && configured.length > 0 ? configured : data.defaultLocalities
}
