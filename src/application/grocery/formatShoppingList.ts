import type { ShoppingList, ShoppingListItem } from '@domain/models/ShoppingList.ts'
import { SECTION_LABELS } from '@domain/constants/sections.ts'
import { formatQuantity } from './formatQuantity.ts'

/**
 * Format a single shopping-list item as plain text.
 * Units are printed as stored. Examples: "3 cup flour", "1 tbsp salt", "2 whole egg"
 */
export function formatShoppingItem(item: ShoppingListItem): string {
  const parts: string[] = [formatQuantity(item.quantity)]

  if (item.unit) {
    parts.push(item.unit)
  }

  parts.push(item.item)

  return parts.join(' ')
}

/**
 * Format a whole shopping list as plain text, grouped by grocery section
 * in the order the sections first appear in the list.
 */
export function formatShoppingListText(list: ShoppingList): string {
  const lines: string[] = []

  const grouped = new Map<string, ShoppingListItem[]>()
  for (const item of list.items) {
    const group = grouped.get(item.grocerySection) ?? []
    group.push(item)
    grouped.set(item.grocerySection, group)
  }

  for (const [section, group] of grouped) {
    lines.push(`\n${SECTION_LABELS[section] ?? section.charAt(0).toUpperCase() + section.slice(1)}`)
    lines.push('---')
    for (const item of group) {
      const prefix = item.checked ? '[x]' : '[ ]'
      lines.push(`${prefix} ${formatShoppingItem(item)}`)
    }
  }

  return lines.join('\n').trim()
}
