/** Volume conversions to teaspoons (base unit). */
export const VOLUME_TO_TSP: Record<string, number> = {
  tsp: 1,
  tbsp: 3,
  cup: 48,
}

/** Weight conversions to ounces (base unit). */
export const WEIGHT_TO_OZ: Record<string, number> = {
  oz: 1,
  lb: 16,
}

/** Count synonyms, all collapsed to the canonical "whole". */
export const COUNT_SYNONYMS = new Set(['whole', 'piece', 'each'])

export const COUNT_UNIT = 'whole'

/**
 * Display ladders, ordered largest to smallest. The last entry is the
 * family's base unit (factor 1).
 */
export const VOLUME_LADDER: [string, number][] = [
  ['cup', 48],
  ['tbsp', 3],
  ['tsp', 1],
]

export const WEIGHT_LADDER: [string, number][] = [
  ['lb', 16],
  ['oz', 1],
]

/** Check if a normalized unit is a volume unit. */
export function isVolumeUnit(unit: string): boolean {
  return Object.hasOwn(VOLUME_TO_TSP, unit)
}

/** Check if a normalized unit is a weight unit. */
export function isWeightUnit(unit: string): boolean {
  return Object.hasOwn(WEIGHT_TO_OZ, unit)
}
