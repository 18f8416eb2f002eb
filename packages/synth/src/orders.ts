import { isCalendarDate, type NumericRange, type Order, type OrderItem } from '@duka/schema'
import { ConfigurationError, ConsistencyViolation, assertPositiveCount } from './errors'
import { pick, randFloat, randInt, roundMoney, type Rng } from './random'
import { createWeightedSampler, tieredWeights, type TierWeightOptions, type WeightedSampler } from './weighted'

const DAY_MS = 24 * 60 * 60 * 1000

export type OrderOptions = TierWeightOptions & {
  orderDateStart: string
  orderDateEnd: string
  quantity: NumericRange
  unitPrice: NumericRange
}

export type OrderInput = {
  customerIds: readonly number[]
  productIds: readonly number[]
  orderCount: number
  itemCount: number
  rng: Rng
  options: OrderOptions
}

export type OrderBatches = {
  orders: Order[]
  orderItems: OrderItem[]
}

export type OrderDraft = Omit<Order, 'totalAmount'>

function parseIsoDate(label: string, value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value)
  if (!match || !isCalendarDate(value)) {
    throw new ConfigurationError(`${label} must be a YYYY-MM-DD date, got "${value}"`)
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))
}

function validateInput(input: OrderInput): void {
  if (input.customerIds.length === 0) {
    throw new ConfigurationError('Cannot generate orders without customer ids')
  }
  if (input.productIds.length === 0) {
    throw new ConfigurationError('Cannot generate order items without product ids')
  }
  assertPositiveCount('Order count', input.orderCount)
  if (!Number.isInteger(input.itemCount) || input.itemCount < 0) {
    throw new ConfigurationError(`Order item count must be a non-negative integer, got ${input.itemCount}`)
  }
}

/**
 * Orders plus order items with every order owning at least one item and each
 * total reconciled from its item subtotals.
 *
 * Passes:
 * 1) order skeletons (random customer + date, no total),
 * 2) one mandatory item per order, in order-id sequence,
 * 3) `itemCount - orderCount` fill items on random orders,
 * 4) reconciliation of totals.
 */
export function synthesizeOrders(input: OrderInput): OrderBatches {
  validateInput(input)
  const { rng, options } = input

  const start = parseIsoDate('orderDateStart', options.orderDateStart)
  const end = parseIsoDate('orderDateEnd', options.orderDateEnd)
  if (end < start) {
    throw new ConfigurationError('orderDateEnd must not be before orderDateStart')
  }
  const totalDays = Math.round((end - start) / DAY_MS) + 1

  const drafts: OrderDraft[] = []
  for (let orderId = 1; orderId <= input.orderCount; orderId++) {
    const day = randInt(rng, 0, totalDays - 1)
    drafts.push({
      orderId,
      customerId: pick(rng, input.customerIds),
      orderDate: new Date(start + day * DAY_MS).toISOString().slice(0, 10),
    })
  }

  const sampler = createWeightedSampler(input.productIds, tieredWeights(input.productIds, options))
  const orderItems: OrderItem[] = []

  for (const order of drafts) {
    orderItems.push(buildItem(orderItems.length + 1, order.orderId, sampler, input))
  }

  const remaining = Math.max(0, input.itemCount - drafts.length)
  for (let i = 0; i < remaining; i++) {
    const order = pick(rng, drafts)
    orderItems.push(buildItem(orderItems.length + 1, order.orderId, sampler, input))
  }

  return {
    orders: reconcileTotals(drafts, orderItems),
    orderItems,
  }
}

function buildItem(
  orderItemId: number,
  orderId: number,
  sampler: WeightedSampler<number>,
  input: OrderInput,
): OrderItem {
  const { rng, options } = input
  const productId = sampler.draw(rng)
  const quantity = randInt(rng, options.quantity.min, options.quantity.max)
  // Point-of-sale price, not the catalog price.
  const unitPrice = roundMoney(randFloat(rng, options.unitPrice.min, options.unitPrice.max))

  return {
    orderItemId,
    orderId,
    productId,
    quantity,
    unitPrice,
    subtotal: roundMoney(quantity * unitPrice),
  }
}

/**
 * Sums subtotals per order and rounds once at the end. Throws when an order
 * has no items, which the mandatory pass rules out.
 */
export function reconcileTotals(drafts: readonly OrderDraft[], items: readonly OrderItem[]): Order[] {
  const sums = new Map<number, number>()
  for (const item of items) {
    sums.set(item.orderId, (sums.get(item.orderId) ?? 0) + item.subtotal)
  }

  return drafts.map((draft) => {
    const sum = sums.get(draft.orderId)
    if (sum === undefined) {
      throw new ConsistencyViolation([`order ${draft.orderId} has no items`])
    }
    return { ...draft, totalAmount: roundMoney(sum) }
  })
}
