import { readFileSync } from 'fs'
import { z } from 'zod'
import type { NutritionReference, Period, PregnancyTarget } from '../../types'

const NutrientMapSchema = z.record(z.string(), z.number().nonnegative())

const ReferenceFileSchema = z
  .object({
    nutrients: z
      .array(
        z.object({
          key: z.string().min(1),
          label: z.string().min(1),
          unit: z.string(),
        })
      )
      .min(1),
    pregnancy_targets: z.record(z.string(), z.number().positive()),
    foods: z.array(
      z.object({
        name: z.string().trim().min(1),
        aliases: z.array(z.string().trim().min(1)).default([]),
        per: z.object({ quantity: z.number().positive(), unit: z.string().trim().min(1) }),
        grams_per_unit: z.number().positive().optional(),
        nutrients: NutrientMapSchema,
      })
    ),
  })
  .superRefine((file, ctx) => {
    const known = new Set(file.nutrients.map((n) => n.key))
    for (const key of Object.keys(file.pregnancy_targets)) {
      if (!known.has(key)) ctx.addIssue({ code: 'custom', path: ['pregnancy_targets', key], message: `unknown nutrient "${key}"` })
    }
    file.foods.forEach((food, i) => {
      for (const key of Object.keys(food.nutrients)) {
        if (!known.has(key)) ctx.addIssue({ code: 'custom', path: ['foods', i, 'nutrients', key], message: `unknown nutrient "${key}"` })
      }
    })
  })

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

/** Validate a parsed reference document. The result is frozen; share it, never copy-and-mutate it. */
export function parseNutritionReference(raw: unknown): NutritionReference {
  const result = ReferenceFileSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid nutrition reference:\n${issues.join('\n')}`)
  }
  const file = result.data
  return deepFreeze({
    nutrients: file.nutrients,
    targets: Object.entries(file.pregnancy_targets).map(([nutrient, daily]) => ({ nutrient, daily })),
    foods: file.foods.map((f) => ({
      name: f.name,
      aliases: f.aliases,
      per: f.per,
      gramsPerUnit: f.grams_per_unit,
      nutrients: f.nutrients,
    })),
  })
}

/** Load the static reference file once at startup. */
export function loadNutritionReference(path: string): NutritionReference {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (e) {
    throw new Error(`Could not read nutrition reference at ${path}`, { cause: e })
  }
  const reference = parseNutritionReference(raw)
  console.log('[reference] loaded %d foods, %d targets from %s', reference.foods.length, reference.targets.length, path)
  return reference
}

/** Targets for a period: daily amounts, times 7 for a week. */
export function targetsFor(reference: NutritionReference, period: Period): PregnancyTarget[] {
  const days = period === 'week' ? 7 : 1
  return reference.targets.map((t) => ({ nutrient: t.nutrient, daily: t.daily * days }))
}
