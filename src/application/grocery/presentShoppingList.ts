import type { AggregationBucket, ShoppingListLine } from '@domain/models/ShoppingList.ts'
import { upconvertQuantity } from './upconvertQuantity.ts'

/**
 * Emit one generated shopping-list line per display quantity of each
 * bucket. Order follows bucket insertion order; callers sort for display.
 */
export function presentShoppingList(buckets: ReadonlyMap<string, AggregationBucket>): ShoppingListLine[] {
  const lines: ShoppingListLine[] = []

  for (const bucket of buckets.values()) {
    for (const { quantity, unit } of upconvertQuantity(bucket.key.family, bucket.baseTotal)) {
      lines.push({
        item: bucket.displayText,
        quantity,
        unit,
        grocerySection: bucket.grocerySection,
        source: 'generated',
      })
    }
  }

  return lines
}
