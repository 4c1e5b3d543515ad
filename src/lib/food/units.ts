/** Spellings the model (or the reference file) may use for the same unit. */
const UNIT_ALIASES: Record<string, string> = {
  n: 'piece',
  pc: 'piece',
  pcs: 'piece',
  pieces: 'piece',
  item: 'piece',
  items: 'piece',
  whole: 'piece',
  gram: 'g',
  grams: 'g',
  gr: 'g',
  kg: 'kg',
  milliliter: 'ml',
  milliliters: 'ml',
  millilitre: 'ml',
  millilitres: 'ml',
  cups: 'cup',
  bowls: 'bowl',
  tbsp: 'tablespoon',
  tablespoons: 'tablespoon',
  tsp: 'teaspoon',
  teaspoons: 'teaspoon',
  servings: 'serving',
  portion: 'serving',
  portions: 'serving',
  slices: 'slice',
}

/** Cup-equivalent per 1 unit for volume scaling. */
const UNIT_TO_CUPS: Record<string, number> = {
  cup: 1,
  bowl: 1.5,
  tablespoon: 0.0625,
  teaspoon: 0.0208,
  ml: 1 / 240,
}

const UNIT_TO_GRAMS: Record<string, number> = {
  g: 1,
  kg: 1000,
}

export function normalizeUnit(unit: string): string {
  const u = unit.toLowerCase().trim().replace(/\.$/, '')
  return UNIT_ALIASES[u] ?? u
}

/**
 * Multiplier that turns the base amount (baseQty baseUnit) into the user amount (userQty userUnit).
 * Same unit → quantity ratio. Volumes convert via cup-equivalents, weights via grams, and
 * pieces ↔ grams via gramsPerUnit when given. Anything else falls back to the quantity ratio.
 */
export function quantityMultiplier(
  userQty: number,
  userUnit: string,
  baseQty: number,
  baseUnit: string,
  gramsPerUnit?: number
): number {
  if (!baseQty) return userQty
  const u = normalizeUnit(userUnit)
  const b = normalizeUnit(baseUnit)
  if (u === b) return userQty / baseQty

  const userCups = UNIT_TO_CUPS[u]
  const baseCups = UNIT_TO_CUPS[b]
  if (userCups != null && baseCups != null) {
    return (userQty * userCups) / (baseQty * baseCups)
  }

  const userGrams = toGrams(userQty, u, gramsPerUnit)
  const baseGrams = toGrams(baseQty, b, gramsPerUnit)
  if (userGrams != null && baseGrams != null && baseGrams > 0) {
    return userGrams / baseGrams
  }

  return userQty / baseQty
}

function toGrams(qty: number, unit: string, gramsPerUnit?: number): number | null {
  const perGram = UNIT_TO_GRAMS[unit]
  if (perGram != null) return qty * perGram
  if (unit === 'piece' && gramsPerUnit != null && gramsPerUnit > 0) return qty * gramsPerUnit
  return null
}
