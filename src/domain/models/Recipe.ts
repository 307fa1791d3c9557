export interface RecipeIngredient {
  quantity: number
  unit: string
  item: string
  grocerySection: string     // produce, meat, dairy, pantry, ... or "other"
}

export type RecipeCategory = 'breakfast' | 'lunch' | 'dinner' | 'snack' | 'dessert'

export interface Recipe {
  id: string
  title: string
  description: string
  category: RecipeCategory
  prepTimeMinutes: number
  cookTimeMinutes: number
  servings: number
  instructions: string
  tags: string[]
  ingredients: RecipeIngredient[]
  createdAt: string
  updatedAt: string
}
