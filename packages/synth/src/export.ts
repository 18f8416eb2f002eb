import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Product } from '@duka/schema'
import { TABLE_COLUMNS } from './tables'

function csvField(value: string | number): string {
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

/**
 * Flat products export mirroring the `products` table. Timestamps are
 * ISO-8601 so the column sorts as text.
 */
export function productsToCsv(products: readonly Product[]): string {
  const lines = [TABLE_COLUMNS.products.join(',')]
  for (const p of products) {
    lines.push(
      [p.productId, p.productName, p.price.toFixed(2), p.stockQuantity, p.sourceSystem, p.createdAt.toISOString()]
        .map(csvField)
        .join(','),
    )
  }
  return lines.join('\n') + '\n'
}

export function writeProductsCsv(products: readonly Product[], filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true })
  writeFileSync(filePath, productsToCsv(products), 'utf8')
}
