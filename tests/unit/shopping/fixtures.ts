import type { Recipe, RecipeIngredient } from '@domain/models/Recipe.ts'

export function makeRecipe(id: string, title: string, ingredients: RecipeIngredient[]): Recipe {
  return {
    id,
    title,
    description: '',
    category: 'dinner',
    prepTimeMinutes: 10,
    cookTimeMinutes: 15,
    servings: 1,
    instructions: '',
    tags: [],
    ingredients,
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: '2024-03-01T00:00:00.000Z',
  }
}

export const OATMEAL = makeRecipe('r-oatmeal', 'Classic Oatmeal', [
  { quantity: 1, unit: 'cup', item: 'rolled oats', grocerySection: 'pantry' },
  { quantity: 2, unit: 'cup', item: 'milk', grocerySection: 'dairy' },
  { quantity: 1, unit: 'tbsp', item: 'honey', grocerySection: 'pantry' },
])

export const STIR_FRY = makeRecipe('r-stir-fry', 'Beef Stir Fry', [
  { quantity: 1, unit: 'lb', item: 'beef strips', grocerySection: 'meat' },
  { quantity: 2, unit: 'cup', item: 'broccoli', grocerySection: 'produce' },
  { quantity: 2, unit: 'tbsp', item: 'soy sauce', grocerySection: 'pantry' },
])

export const MUG_CAKE = makeRecipe('r-mug-cake', 'Chocolate Mug Cake', [
  { quantity: 4, unit: 'tbsp', item: 'flour', grocerySection: 'pantry' },
  { quantity: 1, unit: 'whole', item: 'egg', grocerySection: 'dairy' },
])
