export type { UnitFamily, UnitClassification } from '@domain/models/UnitFamily.ts'
export type {
  RawIngredientLine,
  AggregationKey,
  AggregationBucket,
  ShoppingListLine,
  ShoppingListItem,
  ShoppingList,
  LineSource,
} from '@domain/models/ShoppingList.ts'
export type { Recipe, RecipeIngredient, RecipeCategory } from '@domain/models/Recipe.ts'
export type { MealPlan, PlannedMeal, DayOfWeek, MealSlot } from '@domain/models/MealPlan.ts'
export { ShoppingListError, type ShoppingListErrorCode } from '@domain/errors/ShoppingListError.ts'

export { classifyUnit } from '@application/grocery/classifyUnit.ts'
export { aggregateIngredients, aggregationKeyId, normalizeItemName } from '@application/grocery/aggregateIngredients.ts'
export { upconvertQuantity, type DisplayQuantity } from '@application/grocery/upconvertQuantity.ts'
export { presentShoppingList } from '@application/grocery/presentShoppingList.ts'
export { buildShoppingList } from '@application/grocery/buildShoppingList.ts'
export { formatShoppingItem, formatShoppingListText } from '@application/grocery/formatShoppingList.ts'
export { mealPlanToIngredientLines } from '@application/mealplan/mealPlanToIngredientLines.ts'
export { getWeekStart, offsetWeek, isWeekStart } from '@application/mealplan/weekUtils.ts'
export {
  generateShoppingList,
  getCurrentShoppingList,
  getShoppingList,
  addManualItem,
  toggleItem,
  removeItem,
} from '@application/shopping/shoppingListService.ts'
export type { ManualItemInput } from '@application/shopping/schemas.ts'

export * from '@infrastructure/db/index.ts'
export { loadConfig, type AppConfig } from './config.ts'
