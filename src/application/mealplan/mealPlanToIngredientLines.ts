import type { MealPlan } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { RawIngredientLine } from '@domain/models/ShoppingList.ts'

/** Distinct recipe ids referenced by a plan, in first-seen order. */
export function plannedRecipeIds(plan: MealPlan): string[] {
  return [...new Set(plan.meals.map((meal) => meal.recipeId))]
}

/**
 * Expand planned meals into raw ingredient lines for buildShoppingList().
 * Each meal occurrence contributes its recipe's full ingredient list, so a
 * recipe planned on three days is counted three times. Meals whose recipe
 * is gone are skipped.
 */
export function mealPlanToIngredientLines(plan: MealPlan, recipes: Recipe[]): RawIngredientLine[] {
  const recipeMap = new Map(recipes.map((r) => [r.id, r]))
  const lines: RawIngredientLine[] = []

  for (const meal of plan.meals) {
    const recipe = recipeMap.get(meal.recipeId)
    if (!recipe) continue

    for (const ing of recipe.ingredients) {
      lines.push({
        item: ing.item,
        quantity: ing.quantity,
        unit: ing.unit,
        grocerySection: ing.grocerySection,
      })
    }
  }

  return lines
}
