import { afterEach, describe, expect, it } from 'vitest'
import { IDBFactory, IDBKeyRange, indexedDB } from 'fake-indexeddb'
import { configureDatabase, db } from '@infrastructure/db/database.ts'
import { saveRecipe } from '@infrastructure/db/recipeRepository.ts'
import { addMealToPlan } from '@infrastructure/db/mealPlanRepository.ts'
import { generateShoppingList, getCurrentShoppingList } from '@application/shopping/shoppingListService.ts'
import { config } from '../../../src/config.ts'
import { OATMEAL } from '../shopping/fixtures.ts'

const WEEK = '2024-03-04'

describe('configureDatabase', () => {
  afterEach(async () => {
    await db.delete()
    configureDatabase({ indexedDB, IDBKeyRange })
  })

  it('points the repositories and service at the supplied implementation', async () => {
    const factory = new IDBFactory()
    const configured = configureDatabase({ indexedDB: factory, IDBKeyRange }, 'ConfiguredShoppingDB')

    expect(db).toBe(configured)
    expect(db.name).toBe('ConfiguredShoppingDB')

    await saveRecipe(OATMEAL)
    await addMealToPlan(WEEK, 'mon', 'breakfast', OATMEAL.id)
    const list = await generateShoppingList(WEEK)

    expect(list.items.map((i) => i.item)).toEqual(['milk', 'honey', 'rolled oats'])
    expect((await getCurrentShoppingList()).id).toBe(list.id)

    const supplied = await factory.databases()
    expect(supplied.map((d) => d.name)).toEqual(['ConfiguredShoppingDB'])
    const global = await indexedDB.databases()
    expect(global.map((d) => d.name)).not.toContain('ConfiguredShoppingDB')
  })

  it('keeps the configured name by default', () => {
    const configured = configureDatabase({ indexedDB: new IDBFactory(), IDBKeyRange })

    expect(configured.name).toBe(config.dbName)
  })
})
