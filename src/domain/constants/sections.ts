export const DEFAULT_GROCERY_SECTION = 'other'

/** Section headings for the plain-text export. */
export const SECTION_LABELS: Record<string, string> = {
  produce: 'Produce',
  meat: 'Meat & Poultry',
  seafood: 'Seafood',
  dairy: 'Dairy',
  pantry: 'Pantry',
  spices: 'Spices',
  frozen: 'Frozen',
  beverages: 'Beverages',
  other: 'Other',
}
