import { describe, it, expect, vi } from 'vitest'
import { createApp } from '../../app'
import { fakeQueries } from './fake-queries'

const orderDetail = {
  orderId: 1,
  firstName: 'Otieno',
  lastName: 'Ochieng',
  productName: 'Maize Flour 2kg Classic',
  quantity: 2,
  unitPrice: '150.00',
  subtotal: '300.00',
}

describe('insight routes', () => {
  it('joins order details with a default limit of 50', async () => {
    const queries = fakeQueries({ orderDetails: vi.fn(async () => [orderDetail]) })
    const res = await createApp({ queries }).request('/api/v1/insights/order-details')

    expect(res.status).toBe(200)
    expect(queries.orderDetails).toHaveBeenCalledWith(50)
    expect(await res.json()).toMatchObject({ success: true, count: 1, data: [orderDetail] })
  })

  it('ranks customers by spend', async () => {
    const queries = fakeQueries({
      customerSpend: vi.fn(async () => [{ customerId: 4, firstName: 'Akinyi', lastName: 'Atieno', totalSpent: '9120.40' }]),
    })
    const res = await createApp({ queries }).request('/api/v1/insights/customer-spend?limit=5')

    expect(queries.customerSpend).toHaveBeenCalledWith(5)
    expect(await res.json()).toMatchObject({ data: [{ customerId: 4, totalSpent: '9120.40' }] })
  })

  it('ranks products by units sold', async () => {
    const queries = fakeQueries({
      unitsSold: vi.fn(async () => [{ productId: 2, productName: 'Sugar 1kg Premium', unitsSold: 31 }]),
    })
    const res = await createApp({ queries }).request('/api/v1/insights/units-sold')

    expect(await res.json()).toMatchObject({ count: 1, data: [{ productId: 2, unitsSold: 31 }] })
  })

  it('validates the limit', async () => {
    const queries = fakeQueries()
    const res = await createApp({ queries }).request('/api/v1/insights/units-sold?limit=-1')

    expect(res.status).toBe(400)
    expect(queries.unitsSold).not.toHaveBeenCalled()
  })
})
