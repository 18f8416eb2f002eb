import type { Customer } from '@duka/schema'
import { ConfigurationError, assertPositiveCount } from './errors'
import type { NameProvider } from './names'
import { digits, pick, randInt, type Rng } from './random'
import { localitiesFor, type RegionData } from './regions'

export const PHONE_PREFIXES = ['07', '01'] as const

export type CustomerOptions = {
  rng: Rng
  nameProvider: NameProvider
  regionData: RegionData
  createdAt: Date
  country?: string
}

function emailPart(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '')
}

/** `first.last<id>@example.com`; the id keeps it unique within a batch. */
export function customerEmail(firstName: string, lastName: string, customerId: number): string {
  return `${emailPart(firstName)}.${emailPart(lastName)}${customerId}@example.com`
}

export function kenyanPhone(rng: Rng): string {
  return pick(rng, PHONE_PREFIXES) + digits(rng, 8)
}

export function synthesizeCustomers(count: number, options: CustomerOptions): Customer[] {
  assertPositiveCount('Customer count', count)
  const { rng, nameProvider, regionData } = options
  const regions = nameProvider.regions()
  if (regions.length === 0) {
    throw new ConfigurationError('Name provider has no regions to draw customers from')
  }

  const customers: Customer[] = []
  for (let customerId = 1; customerId <= count; customerId++) {
    const region = pick(rng, regions)
    const person = nameProvider.nameForRegion(region)
    const locality = pick(rng, localitiesFor(regionData, region))
    const postalCode = pick(rng, regionData.postalCodes)

    customers.push({
      customerId,
      firstName: person.firstName,
      lastName: person.lastName,
      email: customerEmail(person.firstName, person.lastName, customerId),
      phone: kenyanPhone(rng),
      addressLine1: `${locality}, ${region}`,
      addressLine2: `P.O. Box ${randInt(rng, 100, 9999)}-${postalCode}, ${region}`,
      city: region,
      country: options.country ?? 'Kenya',
      createdAt: options.createdAt,
    })
  }
  return customers
}
