import type { UnitFamily } from '@domain/models/UnitFamily.ts'
import { COUNT_UNIT, VOLUME_LADDER, WEIGHT_LADDER } from '@domain/constants/units.ts'
import { roundQuantity } from './roundQuantity.ts'

export interface DisplayQuantity {
  quantity: number
  unit: string
}

// Absorbs float noise such as 2.9999999999999996 tsp before flooring.
const EPSILON = 1e-9

/** Display units for a family, largest first, ending with its base unit. */
export function ladderFor(family: UnitFamily): [string, number][] {
  switch (family.kind) {
    case 'volume':
      return VOLUME_LADDER
    case 'weight':
      return WEIGHT_LADDER
    case 'count':
      return [[COUNT_UNIT, 1]]
    case 'other':
      return [[family.unit, 1]]
  }
}

/**
 * Express a base-unit total in the largest whole units that fit, walking
 * the family's ladder from the top. Each coarser unit that fits at least
 * once gets a whole-number line; whatever is left lands in the base unit.
 *
 * Never downconverts: 48 tsp is "1 cup", never "16 tbsp". A base-unit
 * leftover under 1 is dropped once a coarser unit was emitted, and a total
 * that rounds to zero or below produces no line at all.
 *
 * Examples (volume):
 * - 3     -> [1 tbsp]
 * - 4     -> [1 tbsp, 1 tsp]
 * - 50    -> [1 cup, 2 tsp]
 * - 1.5   -> [1.5 tsp]
 * - 47.96 -> [15 tbsp, 3 tsp]
 */
export function upconvertQuantity(family: UnitFamily, baseTotal: number): DisplayQuantity[] {
  const ladder = ladderFor(family)
  const result: DisplayQuantity[] = []
  let remaining = baseTotal

  for (const [unit, factor] of ladder.slice(0, -1)) {
    // The total is compared as is; only a remainder under a coarser unit is rounded.
    const value = result.length === 0 ? remaining : roundQuantity(remaining)
    const whole = Math.floor(value / factor + EPSILON)
    if (whole < 1) continue
    result.push({ quantity: whole, unit })
    remaining -= whole * factor
  }

  const [baseUnit] = ladder[ladder.length - 1]
  const rest = roundQuantity(remaining)
  const emitRest = result.length === 0 ? rest > 0 : rest >= 1
  if (emitRest) {
    result.push({ quantity: rest, unit: baseUnit })
  }

  return result
}
