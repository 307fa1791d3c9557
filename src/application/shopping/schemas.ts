import { z } from 'zod'
import { DEFAULT_GROCERY_SECTION } from '@domain/constants/sections.ts'
import { ShoppingListError } from '@domain/errors/ShoppingListError.ts'
import { isWeekStart } from '@application/mealplan/weekUtils.ts'

export const WeekStartSchema = z
  .string()
  .refine(isWeekStart, { message: 'weekStart must be a Monday in YYYY-MM-DD form' })

export const ManualItemInputSchema = z.object({
  item: z.string().trim().min(1, 'item is required'),
  quantity: z.number().finite().nonnegative(),
  unit: z.string().trim(),
  grocerySection: z.string().trim().min(1).default(DEFAULT_GROCERY_SECTION),
})

export type ManualItemInput = z.input<typeof ManualItemInputSchema>

/** Parse with a zod schema, rethrowing failures as invalid-input errors. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new ShoppingListError('invalid-input', `${path}${issue?.message ?? 'Invalid input'}`)
  }
  return result.data
}
