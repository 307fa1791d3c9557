import Dexie, { type Table } from 'dexie'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { MealPlan } from '@domain/models/MealPlan.ts'
import type { ShoppingList } from '@domain/models/ShoppingList.ts'
import { config } from '../../config.ts'

/** Dexie's own constructor options; pass `indexedDB`/`IDBKeyRange` where there are no globals. */
export type DatabaseOptions = ConstructorParameters<typeof Dexie>[1]

export class ShoppingDB extends Dexie {
  recipes!: Table<Recipe, string>
  mealPlans!: Table<MealPlan, string>
  shoppingLists!: Table<ShoppingList, string>

  constructor(name: string = config.dbName, options?: DatabaseOptions) {
    super(name, options)

    this.version(1).stores({
      recipes: 'id, title, category, updatedAt',
      mealPlans: 'id, &weekStart, updatedAt',
      shoppingLists: 'id, &weekStart, createdAt',
    })
  }
}

export let db = new ShoppingDB()

/**
 * Replace the shared database, e.g. to run on an explicit IndexedDB
 * implementation under Node. Repositories and the shopping-list service read
 * `db` through the live binding, so every later call uses the new instance.
 */
export function configureDatabase(options: DatabaseOptions, name: string = config.dbName): ShoppingDB {
  db.close()
  db = new ShoppingDB(name, options)
  return db
}
