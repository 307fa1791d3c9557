import { beforeEach, describe, expect, it } from 'vitest'
import { db } from '@infrastructure/db/database.ts'
import {
  deleteRecipe,
  getAllRecipes,
  getRecipeById,
  getRecipesByIds,
  saveRecipe,
} from '@infrastructure/db/recipeRepository.ts'
import { MUG_CAKE, OATMEAL, STIR_FRY } from '../shopping/fixtures.ts'

beforeEach(async () => {
  await Promise.all([db.recipes.clear(), db.mealPlans.clear()])
  await saveRecipe(STIR_FRY)
  await saveRecipe(OATMEAL)
})

describe('recipeRepository', () => {
  it('round-trips a recipe with its ingredients', async () => {
    const stored = await getRecipeById(OATMEAL.id)

    expect(stored?.title).toBe('Classic Oatmeal')
    expect(stored?.ingredients).toEqual(OATMEAL.ingredients)
  })

  it('lists recipes by title', async () => {
    expect((await getAllRecipes()).map((r) => r.title)).toEqual(['Beef Stir Fry', 'Classic Oatmeal'])
  })

  it('skips ids with no stored recipe', async () => {
    const found = await getRecipesByIds([OATMEAL.id, MUG_CAKE.id, STIR_FRY.id])

    expect(found.map((r) => r.id)).toEqual([OATMEAL.id, STIR_FRY.id])
  })

  it('deletes a recipe', async () => {
    await deleteRecipe(OATMEAL.id)

    expect(await getRecipeById(OATMEAL.id)).toBeUndefined()
  })
})
