import type { ShoppingList } from '@domain/models/ShoppingList.ts'
import { db } from './database.ts'

export async function saveShoppingList(list: ShoppingList): Promise<void> {
  await db.shoppingLists.put({ ...list, updatedAt: new Date().toISOString() })
}

export async function getShoppingListByWeek(weekStart: string): Promise<ShoppingList | undefined> {
  return db.shoppingLists.where('weekStart').equals(weekStart).first()
}

/** The most recently (re)generated list. */
export async function getLatestShoppingList(): Promise<ShoppingList | undefined> {
  return db.shoppingLists.orderBy('createdAt').reverse().first()
}

export async function deleteShoppingList(id: string): Promise<void> {
  await db.shoppingLists.delete(id)
}
