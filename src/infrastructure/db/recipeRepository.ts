import type { Recipe } from '@domain/models/Recipe.ts'
import { db } from './database.ts'
import { removeRecipeFromPlans } from './mealPlanRepository.ts'

export async function saveRecipe(recipe: Recipe): Promise<void> {
  await db.recipes.put({ ...recipe, updatedAt: new Date().toISOString() })
}

export async function getRecipeById(id: string): Promise<Recipe | undefined> {
  return db.recipes.get(id)
}

export async function getAllRecipes(): Promise<Recipe[]> {
  return db.recipes.orderBy('title').toArray()
}

/** Fetch several recipes at once; ids with no stored recipe are left out. */
export async function getRecipesByIds(ids: string[]): Promise<Recipe[]> {
  const found = await db.recipes.bulkGet(ids)
  return found.filter((r): r is Recipe => r !== undefined)
}

/** Delete a recipe and clear every meal-plan slot that pointed at it. */
export async function deleteRecipe(id: string): Promise<void> {
  await db.transaction('rw', db.recipes, db.mealPlans, async () => {
    await db.recipes.delete(id)
    await removeRecipeFromPlans(id)
  })
}
