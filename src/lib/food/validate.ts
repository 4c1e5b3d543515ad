/**
 * Reject obvious non-food names the model sometimes returns for an empty plate or a non-food photo.
 */

const NON_FOOD_WORDS = new Set([
  'unknown', 'other', 'none', 'n/a', 'nothing', 'no food', 'food', 'meal', 'plate', 'bowl', 'cup', 'glass',
  'table', 'fork', 'spoon', 'knife', 'napkin', 'unidentified', 'unidentified meal', 'unidentified food',
])

const MIN_FOOD_NAME_LENGTH = 2

export function isPlausibleFood(name: string): boolean {
  const t = name.trim().toLowerCase()
  if (t.length < MIN_FOOD_NAME_LENGTH) return false
  if (NON_FOOD_WORDS.has(t)) return false
  if (/^\d+$/.test(t)) return false
  if (/^[a-z]{1,2}$/i.test(t)) return false
  return true
}
