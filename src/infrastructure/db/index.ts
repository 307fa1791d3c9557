export { db, ShoppingDB, configureDatabase, type DatabaseOptions } from './database.ts'
export {
  saveRecipe,
  getRecipeById,
  getAllRecipes,
  getRecipesByIds,
  deleteRecipe,
} from './recipeRepository.ts'
export {
  getMealPlanByWeek,
  saveMealPlan,
  addMealToPlan,
  removeMealFromPlan,
  removeRecipeFromPlans,
} from './mealPlanRepository.ts'
export {
  saveShoppingList,
  getShoppingListByWeek,
  getLatestShoppingList,
  deleteShoppingList,
} from './shoppingListRepository.ts'
