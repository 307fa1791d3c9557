import type { AggregationBucket, AggregationKey, RawIngredientLine } from '@domain/models/ShoppingList.ts'
import { familyKey } from '@domain/models/UnitFamily.ts'
import { classifyUnit } from './classifyUnit.ts'

/** Item identity used for merging: lowercased and trimmed, nothing more. */
export function normalizeItemName(item: string): string {
  return item.toLowerCase().trim()
}

/** Collision-free string form of a key; item and unit text may contain any character. */
export function aggregationKeyId(key: AggregationKey): string {
  return JSON.stringify([key.normalizedItem, familyKey(key.family)])
}

/**
 * Sum raw ingredient lines into buckets keyed by (item, unit family).
 *
 * Totals are kept in the family's base unit (tsp, oz, whole, or the
 * unrecognized unit itself) and are never rounded here. Display text and
 * grocery section come from the first line seen for a key.
 */
export function aggregateIngredients(lines: RawIngredientLine[]): Map<string, AggregationBucket> {
  const buckets = new Map<string, AggregationBucket>()

  for (const line of lines) {
    const { family, baseFactor } = classifyUnit(line.unit)
    const key: AggregationKey = { normalizedItem: normalizeItemName(line.item), family }
    const bucketKey = aggregationKeyId(key)
    const base = line.quantity * baseFactor

    const existing = buckets.get(bucketKey)
    if (existing) {
      existing.baseTotal += base
      continue
    }

    buckets.set(bucketKey, {
      key,
      baseTotal: base,
      displayText: line.item.trim(),
      grocerySection: line.grocerySection,
    })
  }

  return buckets
}
