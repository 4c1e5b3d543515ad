/** Nutrient key → amount (e.g. { folate: 24, potassium: 422 }). Units live in NutrientInfo. */
export type NutrientMap = Record<string, number>

/** Food identified by the model in a photo or meal description */
export interface IdentifiedFood {
  name: string
  quantity: number
  unit: string
}

/** Reference nutrient density for one food (from nutrition_reference.json) */
export interface NutritionFact {
  name: string
  aliases: readonly string[]
  /** Amounts in `nutrients` are for this much of the food */
  per: { quantity: number; unit: string }
  /** Weight of one piece, for converting between pieces and grams */
  gramsPerUnit?: number
  nutrients: Readonly<NutrientMap>
}

/** Daily recommended amount of one nutrient during pregnancy */
export interface PregnancyTarget {
  nutrient: string
  daily: number
}

export interface NutrientInfo {
  key: string
  label: string
  unit: string
}

export interface NutritionReference {
  nutrients: readonly NutrientInfo[]
  foods: readonly NutritionFact[]
  targets: readonly PregnancyTarget[]
}

/** One logged food item. Nutrients are fixed at insert time. */
export interface FoodEntry {
  id?: number
  userId: number
  /** Epoch milliseconds */
  timestamp: number
  foodName: string
  quantity: number
  unit: string
  nutrients: NutrientMap
}

export type Period = 'day' | 'week'

export interface TimeRange {
  /** Inclusive, epoch ms */
  start: number
  /** Exclusive, epoch ms */
  end: number
}

export interface NutrientGap {
  nutrient: string
  consumed: number
  target: number
  /** max(0, target - consumed) */
  deficit: number
  /** consumed / target, whole percent */
  percent: number
}

export interface GapReport {
  userId: number
  period: Period
  range: TimeRange
  entryCount: number
  nutrients: NutrientGap[]
}
