import type { FoodEntry, GapReport, NutrientGap, NutrientMap, Period, PregnancyTarget, TimeRange } from '../../types'

function round1(n: number): number {
  return Math.round(n * 10) / 10
}

/** Sum nutrient amounts across entries. */
export function sumNutrients(entries: readonly FoodEntry[]): NutrientMap {
  const totals: NutrientMap = {}
  for (const entry of entries) {
    for (const [key, amount] of Object.entries(entry.nutrients)) {
      totals[key] = (totals[key] ?? 0) + amount
    }
  }
  return totals
}

/**
 * Compare intake with targets. Deficits never go negative (a surplus is not a need);
 * consumed and target are rounded to 1 decimal and the deficit is taken from those rounded values.
 * Nutrients without a target are left out.
 */
export function summarize(
  userId: number,
  entries: readonly FoodEntry[],
  targets: readonly PregnancyTarget[],
  period: Period,
  range: TimeRange
): GapReport {
  const totals = sumNutrients(entries)
  const nutrients: NutrientGap[] = targets.map((t) => {
    const consumed = round1(totals[t.nutrient] ?? 0)
    const target = round1(t.daily)
    return {
      nutrient: t.nutrient,
      consumed,
      target,
      deficit: round1(Math.max(0, target - consumed)),
      percent: target > 0 ? Math.round((consumed / target) * 100) : 0,
    }
  })
  return { userId, period, range, entryCount: entries.length, nutrients }
}

export function hasDeficit(report: GapReport): boolean {
  return report.nutrients.some((n) => n.deficit > 0)
}

/** Local-time range: today for "day", today and the six days before it for "week". */
export function periodRange(period: Period, now: Date = new Date()): TimeRange {
  const midnight = new Date(now.getFullYear(), now.getMonth(), now.getDate())
  const end = new Date(midnight.getFullYear(), midnight.getMonth(), midnight.getDate() + 1).getTime()
  const days = period === 'week' ? 7 : 1
  const start = new Date(midnight.getFullYear(), midnight.getMonth(), midnight.getDate() - (days - 1)).getTime()
  return { start, end }
}
