import type { UnitFamily } from './UnitFamily.ts'

export type LineSource = 'generated' | 'manual'

export interface RawIngredientLine {
  item: string
  quantity: number
  unit: string
  grocerySection: string
}

export interface AggregationKey {
  normalizedItem: string // lowercase, trimmed
  family: UnitFamily
}

export interface AggregationBucket {
  key: AggregationKey
  baseTotal: number         // exact sum in the family's base unit
  displayText: string       // from the first line seen for this key
  grocerySection: string    // from the first line seen for this key
}

export interface ShoppingListLine {
  item: string
  quantity: number          // rounded to 1 decimal place
  unit: string
  grocerySection: string
  source: LineSource
}

export interface ShoppingListItem extends ShoppingListLine {
  id: string
  checked: boolean
}

export interface ShoppingList {
  id: string
  weekStart: string          // ISO date of Monday (YYYY-MM-DD)
  items: ShoppingListItem[]
  createdAt: string
  updatedAt: string
}
