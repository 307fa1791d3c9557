export type UnitFamily =
  | { kind: 'volume' }
  | { kind: 'weight' }
  | { kind: 'count' }
  | { kind: 'other'; unit: string } // singleton family for an unrecognized unit

export interface UnitClassification {
  family: UnitFamily
  canonicalUnit: string
  baseFactor: number // multiply to reach the family's base unit
}

/** Stable string form of a family, used inside aggregation keys. */
export function familyKey(family: UnitFamily): string {
  return family.kind === 'other' ? `other:${family.unit}` : family.kind
}
