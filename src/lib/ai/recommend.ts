import type { GapReport, NutrientGap, NutrientInfo, NutritionReference } from '../../types'
import { hasDeficit } from '../analysis/summarize'
import { AnalysisError, errorMessage } from '../utils/errors'
import { complete, type AiContext } from './client'

export const SYSTEM_PROMPT =
  'You are a friendly, supportive nutritionist specializing in pregnancy nutrition. Give practical, encouraging, pregnancy-safe advice. Plain text, no markdown.'

export const TARGETS_MET_MESSAGE = "You're meeting all your nutrient targets for this period. Keep it up!"

export function nutrientInfo(reference: NutritionReference, key: string): NutrientInfo {
  return reference.nutrients.find((n) => n.key === key) ?? { key, label: key, unit: '' }
}

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(1)
}

export function formatAmount(n: number, info: NutrientInfo): string {
  return info.unit ? `${fmt(n)} ${info.unit}` : fmt(n)
}

/** Nutrients below target, lowest percentage first. */
export function largestGaps(report: GapReport, limit: number): NutrientGap[] {
  return report.nutrients
    .filter((n) => n.deficit > 0)
    .sort((a, b) => a.percent - b.percent || b.deficit - a.deficit)
    .slice(0, limit)
}

/** Reference foods with the most of a nutrient per listed portion. */
export function foodsRichIn(reference: NutritionReference, nutrient: string, limit: number): string[] {
  return reference.foods
    .filter((f) => (f.nutrients[nutrient] ?? 0) > 0)
    .sort((a, b) => (b.nutrients[nutrient] ?? 0) - (a.nutrients[nutrient] ?? 0))
    .slice(0, limit)
    .map((f) => f.name)
}

/** Intake and gaps in plain lines, for model prompts. */
export function describeIntake(report: GapReport, reference: NutritionReference): string {
  const intake = report.nutrients.map((n) => {
    const info = nutrientInfo(reference, n.nutrient)
    return `- ${info.label}: ${fmt(n.consumed)} / ${formatAmount(n.target, info)}`
  })
  const gaps = largestGaps(report, report.nutrients.length).map((n) => {
    const info = nutrientInfo(reference, n.nutrient)
    return `- ${info.label}: ${formatAmount(n.deficit, info)} below target`
  })
  const span = report.period === 'week' ? 'the last 7 days' : 'today'
  return `Intake for ${span} (${report.entryCount} food items logged), consumed / target:
${intake.join('\n')}

Nutrients that need attention:
${gaps.length ? gaps.join('\n') : '- none, every target is met'}`
}

function buildPrompt(report: GapReport, reference: NutritionReference): string {
  return `${describeIntake(report, reference)}

Give 2-3 specific, practical meal or snack suggestions that close the biggest gaps. Keep each suggestion to one or two sentences.`
}

/** Ask the text model to phrase a recommendation for the report's gaps. */
export async function phraseRecommendation(ai: AiContext, report: GapReport, reference: NutritionReference): Promise<string> {
  return complete(ai, {
    model: ai.textModel,
    max_tokens: 300,
    temperature: 0.7,
    messages: [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildPrompt(report, reference) },
    ],
  })
}

/** Non-AI recommendation built from the reference table. */
export function templateRecommendation(report: GapReport, reference: NutritionReference): string {
  const gaps = largestGaps(report, 3)
  if (gaps.length === 0) return TARGETS_MET_MESSAGE
  const lines = ['Focus on:']
  for (const gap of gaps) {
    const info = nutrientInfo(reference, gap.nutrient)
    const foods = foodsRichIn(reference, gap.nutrient, 3)
    const tip = foods.length ? ` (try ${foods.join(', ')})` : ''
    lines.push(`• ${info.label}: ${formatAmount(gap.deficit, info)} to go${tip}`)
  }
  return lines.join('\n')
}

/** Recommendation text that is never empty: the model's, or the template when the model call fails. */
export async function recommend(ai: AiContext, report: GapReport, reference: NutritionReference): Promise<string> {
  if (!hasDeficit(report)) return TARGETS_MET_MESSAGE
  try {
    return await phraseRecommendation(ai, report, reference)
  } catch (e) {
    if (!(e instanceof AnalysisError)) throw e
    console.error('[ai] recommendation fell back to template:', errorMessage(e))
    return templateRecommendation(report, reference)
  }
}
