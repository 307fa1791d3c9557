import type { UnitClassification } from '@domain/models/UnitFamily.ts'
import {
  COUNT_SYNONYMS,
  COUNT_UNIT,
  VOLUME_TO_TSP,
  WEIGHT_TO_OZ,
  isVolumeUnit,
  isWeightUnit,
} from '@domain/constants/units.ts'

/**
 * Resolve a raw unit string to its family, canonical unit and factor to
 * the family's base unit. Unrecognized units become their own singleton
 * family, so this never throws.
 */
export function classifyUnit(unit: string): UnitClassification {
  const normalized = unit.toLowerCase().trim()

  if (isVolumeUnit(normalized)) {
    return { family: { kind: 'volume' }, canonicalUnit: normalized, baseFactor: VOLUME_TO_TSP[normalized] }
  }
  if (isWeightUnit(normalized)) {
    return { family: { kind: 'weight' }, canonicalUnit: normalized, baseFactor: WEIGHT_TO_OZ[normalized] }
  }
  if (COUNT_SYNONYMS.has(normalized)) {
    return { family: { kind: 'count' }, canonicalUnit: COUNT_UNIT, baseFactor: 1 }
  }
  return { family: { kind: 'other', unit: normalized }, canonicalUnit: normalized, baseFactor: 1 }
}
