import type { RawIngredientLine, ShoppingListLine } from '@domain/models/ShoppingList.ts'
import { aggregateIngredients } from './aggregateIngredients.ts'
import { presentShoppingList } from './presentShoppingList.ts'

/**
 * Turn every ingredient line of a week's planned recipes (duplicates
 * included) into merged, up-converted shopping-list lines.
 */
export function buildShoppingList(lines: RawIngredientLine[]): ShoppingListLine[] {
  return presentShoppingList(aggregateIngredients(lines))
}
