import type { MealPlan, PlannedMeal, DayOfWeek, MealSlot } from '@domain/models/MealPlan.ts'
import { db } from './database.ts'

export async function getMealPlanByWeek(weekStart: string): Promise<MealPlan | undefined> {
  return db.mealPlans.where('weekStart').equals(weekStart).first()
}

export async function saveMealPlan(plan: MealPlan): Promise<void> {
  await db.mealPlans.put({ ...plan, updatedAt: new Date().toISOString() })
}

/** Assign a recipe to a day/slot, replacing whatever was planned there. */
export async function addMealToPlan(
  weekStart: string,
  day: DayOfWeek,
  slot: MealSlot,
  recipeId: string,
): Promise<PlannedMeal> {
  let plan = await getMealPlanByWeek(weekStart)

  const meal: PlannedMeal = {
    id: `meal-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`,
    day,
    slot,
    recipeId,
  }

  if (!plan) {
    const now = new Date().toISOString()
    plan = {
      id: `mp-${weekStart}`,
      weekStart,
      meals: [meal],
      createdAt: now,
      updatedAt: now,
    }
  } else {
    plan.meals = plan.meals.filter((m) => !(m.day === day && m.slot === slot))
    plan.meals.push(meal)
  }

  await saveMealPlan(plan)
  return meal
}

export async function removeMealFromPlan(
  weekStart: string,
  mealId: string,
): Promise<void> {
  const plan = await getMealPlanByWeek(weekStart)
  if (!plan) return

  plan.meals = plan.meals.filter((m) => m.id !== mealId)
  await saveMealPlan(plan)
}

/** Drop every planned meal that uses the given recipe, across all weeks. */
export async function removeRecipeFromPlans(recipeId: string): Promise<void> {
  const plans = await db.mealPlans.toArray()

  for (const plan of plans) {
    if (!plan.meals.some((m) => m.recipeId === recipeId)) continue
    plan.meals = plan.meals.filter((m) => m.recipeId !== recipeId)
    await saveMealPlan(plan)
  }
}
