export type Trimester = 1 | 2 | 3

export interface PregnancyStage {
  week: number
  trimester: Trimester
}

const TRIMESTER_NAMES: Record<Trimester, string> = { 1: 'first', 2: 'second', 3: 'third' }

/** Week of pregnancy (1–42) counted from the configured start date (YYYY-MM-DD, local). */
export function pregnancyStage(startDate: string, now: Date = new Date()): PregnancyStage {
  const [y, m, d] = startDate.split('-').map(Number)
  const start = new Date(y, m - 1, d)
  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate())
  const days = Math.round((today.getTime() - start.getTime()) / 86_400_000)
  const week = Math.max(1, Math.min(42, Math.floor(days / 7)))
  const trimester: Trimester = week <= 12 ? 1 : week <= 27 ? 2 : 3
  return { week, trimester }
}

export function trimesterName(trimester: Trimester): string {
  return TRIMESTER_NAMES[trimester]
}

/** "week 18 (second trimester)" */
export function describeStage(stage: PregnancyStage): string {
  return `week ${stage.week} (${trimesterName(stage.trimester)} trimester)`
}
