import type { FoodEntry, IdentifiedFood, NutrientMap, NutritionFact, NutritionReference } from '../../types'
import { quantityMultiplier } from './units'

function normalize(s: string): string {
  return s
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function singular(s: string): string {
  if (s.endsWith('ies') && s.length > 4) return `${s.slice(0, -3)}y`
  if (s.endsWith('oes') && s.length > 4) return s.slice(0, -2)
  if (s.endsWith('s') && !s.endsWith('ss') && s.length > 3) return s.slice(0, -1)
  return s
}

function namesOf(fact: NutritionFact): string[] {
  return [fact.name, ...fact.aliases].map((n) => singular(normalize(n)))
}

/**
 * Match a model-reported food name to the reference: exact name/alias first, then the longest
 * name contained in the query ("sliced banana" → banana), then the query contained in a name.
 */
export function findFact(reference: NutritionReference, name: string): NutritionFact | null {
  const want = singular(normalize(name))
  if (!want) return null

  let contained: { fact: NutritionFact; length: number } | null = null
  let containing: NutritionFact | null = null
  for (const fact of reference.foods) {
    for (const n of namesOf(fact)) {
      if (n === want) return fact
      if (` ${want} `.includes(` ${n} `)) {
        if (!contained || n.length > contained.length) contained = { fact, length: n.length }
      } else if (!containing && ` ${n} `.includes(` ${want} `)) {
        containing = fact
      }
    }
  }
  return contained?.fact ?? containing
}

function round2(n: number): number {
  return Math.round(n * 100) / 100
}

/** Scale a fact's nutrients to quantity × unit. Amounts are rounded to 2 decimals. */
export function nutrientsFor(fact: NutritionFact, quantity: number, unit: string): NutrientMap {
  const mult = quantityMultiplier(quantity, unit, fact.per.quantity, fact.per.unit, fact.gramsPerUnit)
  const out: NutrientMap = {}
  for (const [key, amount] of Object.entries(fact.nutrients)) {
    out[key] = round2(amount * mult)
  }
  return out
}

export interface ResolvedFoods {
  entries: FoodEntry[]
  /** Foods the model reported that are not in the reference table */
  unmatched: IdentifiedFood[]
}

/** Turn identified foods into diary entries. Nothing is written here. */
export function resolveFoods(
  reference: NutritionReference,
  foods: readonly IdentifiedFood[],
  userId: number,
  timestamp: number
): ResolvedFoods {
  const entries: FoodEntry[] = []
  const unmatched: IdentifiedFood[] = []
  for (const food of foods) {
    const fact = findFact(reference, food.name)
    if (!fact) {
      unmatched.push(food)
      continue
    }
    const quantity = round2(food.quantity)
    entries.push({
      userId,
      timestamp,
      foodName: fact.name,
      quantity,
      unit: food.unit,
      nutrients: nutrientsFor(fact, quantity, food.unit),
    })
  }
  return { entries, unmatched }
}
