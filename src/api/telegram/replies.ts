import type { FoodEntry, GapReport, IdentifiedFood, NutritionReference } from '../../types'
import { describeStage, type PregnancyStage } from '../../lib/pregnancy/profile'
import { sumNutrients, hasDeficit } from '../../lib/analysis/summarize'
import { formatAmount, nutrientInfo } from '../../lib/ai/recommend'
import { BotError } from '../../lib/utils/errors'

export const HELP_MESSAGE = `Send me a photo of your meal and I'll log what's on the plate.
You can also describe it in text or a voice note, e.g. "2 eggs and a slice of toast",
or ask me things like "what am I missing today?".

Commands:
/diary - today's nutrients vs. your pregnancy targets
/weekly - the last 7 days
/help - this message`

export const NO_FOODS_MESSAGE =
  "I couldn't identify any foods there, so nothing was logged. Try a clearer photo that shows the whole plate."

export const NO_FOODS_IN_TEXT_MESSAGE =
  'I couldn\'t find any foods in that, so nothing was logged. Name each food and roughly how much, e.g. "2 eggs and a slice of toast".'

export const GENERIC_ERROR_MESSAGE = 'Something went wrong; try again.'

/** Nutrients shown in the confirmation after logging, when the reference defines them */
const LOGGED_KEY_NUTRIENTS = ['calories', 'protein', 'folate', 'iron', 'calcium']

export function welcomeMessage(firstName: string | undefined, stage: PregnancyStage | null): string {
  const hello = `👋 Hi${firstName ? ` ${firstName}` : ''}! I track what you eat during pregnancy.`
  const week = stage ? `\n🤰 You're in ${describeStage(stage)}.` : ''
  return `${hello}${week}\n\n${HELP_MESSAGE}`
}

function describeItem(item: { quantity: number; unit: string }, name: string): string {
  return `${item.quantity} ${item.unit} ${name}`
}

/** Confirmation after a meal: what was stored, key nutrient totals, and anything skipped. */
export function formatLoggedMessage(
  stored: readonly FoodEntry[],
  unmatched: readonly IdentifiedFood[],
  reference: NutritionReference
): string {
  const lines: string[] = []
  if (stored.length) {
    lines.push(`✅ Logged ${stored.length} ${stored.length === 1 ? 'item' : 'items'}:`)
    for (const entry of stored) lines.push(`• ${describeItem(entry, entry.foodName)}`)
    const totals = sumNutrients(stored)
    const key = LOGGED_KEY_NUTRIENTS.filter((k) => totals[k] !== undefined).map((k) => {
      const info = nutrientInfo(reference, k)
      return `${info.label} ${formatAmount(Math.round(totals[k] * 10) / 10, info)}`
    })
    if (key.length) lines.push('', `📊 ${key.join(', ')}`)
  } else {
    lines.push('⚠️ Nothing was logged.')
  }
  if (unmatched.length) {
    lines.push('', `Not in my nutrition table, so not logged: ${unmatched.map((f) => f.name).join(', ')}`)
  }
  if (stored.length) lines.push('', 'Send /diary to see how today adds up.')
  return lines.join('\n')
}

function statusEmoji(percent: number): string {
  if (percent >= 90) return '✅'
  if (percent >= 70) return '⚠️'
  return '❌'
}

/** /diary and /weekly reply: one line per targeted nutrient, then the recommendation. */
export function formatGapReport(report: GapReport, reference: NutritionReference, recommendation: string): string {
  const count = `${report.entryCount} ${report.entryCount === 1 ? 'item' : 'items'} logged`
  const title = report.period === 'week' ? `📊 Last 7 days (${count})` : `📊 Today (${count})`
  const lines = [title, '']
  for (const n of report.nutrients) {
    const info = nutrientInfo(reference, n.nutrient)
    lines.push(`${statusEmoji(n.percent)} ${info.label}: ${n.consumed} / ${formatAmount(n.target, info)} (${n.percent}%)`)
  }
  lines.push('')
  lines.push(hasDeficit(report) ? `💡 Recommendations:\n${recommendation}` : `🎉 ${recommendation}`)
  return lines.join('\n')
}

export function transcriptPrefix(transcript: string): string {
  return `🎤 "${transcript}"\n\n`
}

/** User-facing text for a failed update. Never a stack trace. */
export function replyForError(e: unknown): string {
  return e instanceof BotError ? e.safeMessage : GENERIC_ERROR_MESSAGE
}
