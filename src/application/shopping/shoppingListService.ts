import type { ShoppingList, ShoppingListItem, ShoppingListLine } from '@domain/models/ShoppingList.ts'
import { ShoppingListError } from '@domain/errors/ShoppingListError.ts'
import { buildShoppingList } from '@application/grocery/buildShoppingList.ts'
import { mealPlanToIngredientLines, plannedRecipeIds } from '@application/mealplan/mealPlanToIngredientLines.ts'
import { formatWeekRange } from '@application/mealplan/weekUtils.ts'
import { db } from '@infrastructure/db/database.ts'
import { getRecipesByIds } from '@infrastructure/db/recipeRepository.ts'
import { getMealPlanByWeek } from '@infrastructure/db/mealPlanRepository.ts'
import {
  getLatestShoppingList,
  getShoppingListByWeek,
  saveShoppingList,
} from '@infrastructure/db/shoppingListRepository.ts'
import { logDebug, logInfo, logWarn } from '@infrastructure/logging/log.ts'
import { ManualItemInputSchema, WeekStartSchema, parseInput, type ManualItemInput } from './schemas.ts'

function newId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`
}

function toItem(line: ShoppingListLine): ShoppingListItem {
  return { ...line, id: newId('item'), checked: false }
}

/** Sort by grocery section, then item name. */
export function sortShoppingItems(items: ShoppingListItem[]): ShoppingListItem[] {
  return [...items].sort((a, b) => {
    if (a.grocerySection !== b.grocerySection) {
      return a.grocerySection.localeCompare(b.grocerySection)
    }
    return a.item.localeCompare(b.item)
  })
}

function withSortedItems(list: ShoppingList): ShoppingList {
  return { ...list, items: sortShoppingItems(list.items) }
}

async function requireListForWeek(weekStart: string): Promise<ShoppingList> {
  const list = await getShoppingListByWeek(weekStart)
  if (!list) {
    throw new ShoppingListError('not-found', `No shopping list for week ${weekStart}. Generate one first.`)
  }
  return list
}

/**
 * Build the shopping list for a week from every recipe planned in it.
 *
 * Generated items from a previous run are replaced wholesale; manual items
 * (and whether they are checked) carry over untouched. The read-modify-write
 * runs in one Dexie transaction so concurrent regenerations of the same
 * week do not interleave.
 */
export async function generateShoppingList(weekStart: string): Promise<ShoppingList> {
  const week = parseInput(WeekStartSchema, weekStart)

  const list = await db.transaction('rw', db.recipes, db.mealPlans, db.shoppingLists, async () => {
    const plan = await getMealPlanByWeek(week)
    if (!plan || plan.meals.length === 0) {
      logWarn(`No meals planned for ${formatWeekRange(week)}; generated list will be empty`)
    }

    const recipes = plan ? await getRecipesByIds(plannedRecipeIds(plan)) : []
    const lines = plan ? mealPlanToIngredientLines(plan, recipes) : []
    const generated = buildShoppingList(lines).map(toItem)
    logDebug(`${lines.length} ingredient lines merged into ${generated.length} items`)

    const existing = await getShoppingListByWeek(week)
    const manual = existing ? existing.items.filter((i) => i.source === 'manual') : []
    const now = new Date().toISOString()

    const next: ShoppingList = {
      id: existing?.id ?? newId('list'),
      weekStart: week,
      items: [...generated, ...manual],
      createdAt: now,
      updatedAt: now,
    }
    await saveShoppingList(next)
    return next
  })

  logInfo(`Generated ${list.items.length} items for ${formatWeekRange(week)}`)
  return withSortedItems(list)
}

/** The most recently generated shopping list. */
export async function getCurrentShoppingList(): Promise<ShoppingList> {
  const list = await getLatestShoppingList()
  if (!list) {
    throw new ShoppingListError('not-found', 'No shopping list found')
  }
  return withSortedItems(list)
}

export async function getShoppingList(weekStart: string): Promise<ShoppingList> {
  const week = parseInput(WeekStartSchema, weekStart)
  return withSortedItems(await requireListForWeek(week))
}

/**
 * Append a user-entered item. It bypasses aggregation and survives
 * regeneration. The grocery section defaults to "other".
 */
export async function addManualItem(weekStart: string, input: ManualItemInput): Promise<ShoppingListItem> {
  const week = parseInput(WeekStartSchema, weekStart)
  const parsed = parseInput(ManualItemInputSchema, input)

  return db.transaction('rw', db.shoppingLists, async () => {
    const list = await requireListForWeek(week)
    const item: ShoppingListItem = {
      id: newId('item'),
      item: parsed.item,
      quantity: parsed.quantity,
      unit: parsed.unit,
      grocerySection: parsed.grocerySection,
      source: 'manual',
      checked: false,
    }
    list.items.push(item)
    await saveShoppingList(list)
    logInfo(`Added manual item "${item.item}" to ${formatWeekRange(week)}`)
    return item
  })
}

/** Flip an item's checked state and return the updated item. */
export async function toggleItem(weekStart: string, itemId: string): Promise<ShoppingListItem> {
  const week = parseInput(WeekStartSchema, weekStart)

  return db.transaction('rw', db.shoppingLists, async () => {
    const list = await requireListForWeek(week)
    const item = list.items.find((i) => i.id === itemId)
    if (!item) {
      throw new ShoppingListError('not-found', `Shopping item ${itemId} not found`)
    }
    item.checked = !item.checked
    await saveShoppingList(list)
    return item
  })
}

export async function removeItem(weekStart: string, itemId: string): Promise<void> {
  const week = parseInput(WeekStartSchema, weekStart)

  await db.transaction('rw', db.shoppingLists, async () => {
    const list = await requireListForWeek(week)
    if (!list.items.some((i) => i.id === itemId)) {
      throw new ShoppingListError('not-found', `Shopping item ${itemId} not found`)
    }
    list.items = list.items.filter((i) => i.id !== itemId)
    await saveShoppingList(list)
  })
}
