import { describe, it, expect } from 'vitest'
import { formatShoppingItem, formatShoppingListText } from '@application/grocery/formatShoppingList.ts'
import { formatQuantity } from '@application/grocery/formatQuantity.ts'
import type { ShoppingList, ShoppingListItem } from '@domain/models/ShoppingList.ts'

function makeItem(overrides: Partial<ShoppingListItem>): ShoppingListItem {
  return {
    id: 'item-1',
    item: 'flour',
    quantity: 1,
    unit: 'cup',
    grocerySection: 'pantry',
    source: 'generated',
    checked: false,
    ...overrides,
  }
}

describe('formatQuantity', () => {
  it('formats whole numbers, halves and decimals', () => {
    expect(formatQuantity(2)).toBe('2')
    expect(formatQuantity(0.5)).toBe('1/2')
    expect(formatQuantity(1.5)).toBe('1 1/2')
    expect(formatQuantity(10.7)).toBe('10.7')
    expect(formatQuantity(0)).toBe('0')
  })

  it('keeps one-decimal quantities near a whole number as decimals', () => {
    expect(formatQuantity(2.9)).toBe('2.9')
    expect(formatQuantity(0.1)).toBe('0.1')
  })
})

describe('formatShoppingItem', () => {
  it('prints the stored unit unchanged', () => {
    expect(formatShoppingItem(makeItem({ quantity: 3 }))).toBe('3 cup flour')
    expect(formatShoppingItem(makeItem({ quantity: 1 }))).toBe('1 cup flour')
    expect(formatShoppingItem(makeItem({ item: 'salt', quantity: 2, unit: 'tbsp' }))).toBe('2 tbsp salt')
  })

  it('omits an empty unit', () => {
    expect(formatShoppingItem(makeItem({ item: 'paper towels', quantity: 1, unit: '' }))).toBe('1 paper towels')
  })
})

describe('formatShoppingListText', () => {
  it('groups by section in order of first appearance', () => {
    const list: ShoppingList = {
      id: 'list-1',
      weekStart: '2024-03-04',
      createdAt: '2024-03-04T00:00:00.000Z',
      updatedAt: '2024-03-04T00:00:00.000Z',
      items: [
        makeItem({ item: 'flour', quantity: 3 }),
        makeItem({ item: 'milk', quantity: 2, grocerySection: 'dairy', checked: true }),
        makeItem({ item: 'beef', quantity: 10.7, unit: 'oz', grocerySection: 'meat' }),
        makeItem({ item: 'sugar', quantity: 1.5, unit: 'tbsp' }),
        makeItem({ item: 'foil', quantity: 1, unit: 'roll', grocerySection: 'household', source: 'manual' }),
      ],
    }

    expect(formatShoppingListText(list)).toBe(
      [
        'Pantry',
        '---',
        '[ ] 3 cup flour',
        '[ ] 1 1/2 tbsp sugar',
        '',
        'Dairy',
        '---',
        '[x] 2 cup milk',
        '',
        'Meat & Poultry',
        '---',
        '[ ] 10.7 oz beef',
        '',
        'Household',
        '---',
        '[ ] 1 roll foil',
      ].join('\n'),
    )
  })

  it('returns an empty string for an empty list', () => {
    const list: ShoppingList = {
      id: 'list-1',
      weekStart: '2024-03-04',
      createdAt: '2024-03-04T00:00:00.000Z',
      updatedAt: '2024-03-04T00:00:00.000Z',
      items: [],
    }
    expect(formatShoppingListText(list)).toBe('')
  })
})
