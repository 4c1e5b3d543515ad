import type { GapReport, NutritionReference } from '../../types'
import { describeStage, type PregnancyStage } from '../pregnancy/profile'
import { AnalysisError, errorMessage } from '../utils/errors'
import { complete, type AiContext } from './client'
import { SYSTEM_PROMPT, describeIntake, templateRecommendation } from './recommend'

function stageContext(stage: PregnancyStage | null): string {
  return stage ? `She is in ${describeStage(stage)}.` : 'Her pregnancy week is not known.'
}

/** Answer "what am I missing?" / "which week am I in?" from today's report and the pregnancy stage. */
export async function answerQuestion(
  ai: AiContext,
  question: string,
  report: GapReport,
  reference: NutritionReference,
  stage: PregnancyStage | null
): Promise<string> {
  try {
    return await complete(ai, {
      model: ai.textModel,
      max_tokens: 400,
      temperature: 0.7,
      messages: [
        { role: 'system', content: `${SYSTEM_PROMPT} Answer directly from the data given; do not ask for it.` },
        {
          role: 'user',
          content: `${stageContext(stage)}

${describeIntake(report, reference)}

Her question: "${question}"

Answer in at most 5 short sentences. Name specific foods when suggesting what to eat.`,
        },
      ],
    })
  } catch (e) {
    if (!(e instanceof AnalysisError)) throw e
    console.error('[ai] question answer fell back to template:', errorMessage(e))
    return questionFallback(report, reference, stage)
  }
}

/** Stage, today's count and the template recommendation. */
export function questionFallback(report: GapReport, reference: NutritionReference, stage: PregnancyStage | null): string {
  const parts: string[] = []
  if (stage) parts.push(`🤰 You're in ${describeStage(stage)}.`)
  parts.push(`Today so far: ${report.entryCount} ${report.entryCount === 1 ? 'item' : 'items'} logged.`)
  parts.push(templateRecommendation(report, reference))
  return parts.join('\n\n')
}

export interface ChatContext {
  entriesToday: number
  stage: PregnancyStage | null
}

/** Short conversational reply for messages that are neither meals nor questions; `fallback` when the model fails. */
export async function smallTalk(ai: AiContext, text: string, context: ChatContext, fallback: string): Promise<string> {
  try {
    return await complete(ai, {
      model: ai.textModel,
      max_tokens: 200,
      temperature: 0.7,
      messages: [
        {
          role: 'system',
          content: `${SYSTEM_PROMPT} You are a pregnancy food-diary bot. You can log meals from photos, text or voice notes, answer nutrition questions, and show /diary and /weekly reports.`,
        },
        {
          role: 'user',
          content: `${stageContext(context.stage)} She has logged ${context.entriesToday} food items today.

She said: "${text}"

Reply in 2-3 friendly sentences. If she asks what you can do, explain it.`,
        },
      ],
    })
  } catch (e) {
    if (!(e instanceof AnalysisError)) throw e
    console.error('[ai] small talk fell back to help:', errorMessage(e))
    return fallback
  }
}
