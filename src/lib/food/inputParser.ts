import { z } from 'zod'
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions'
import type { IdentifiedFood } from '../../types'
import { complete, extractJson, type AiContext } from '../ai/client'
import { AnalysisError, ValidationError } from '../utils/errors'
import { isPlausibleFood } from './validate'

const OUTPUT_RULES = `Return valid JSON only, no markdown or extra text.

Output structure (use exactly these keys and types):
{
  "foods": [
    {"name": "string", "quantity": number, "unit": "string"}
  ]
}

Unit rules (use these exact strings when applicable):
- Countable items (eggs, bananas, apples): unit "piece".
- Sliced items (bread, toast): unit "slice".
- Liquids and bowls: "cup" or "ml".
- Everything else: estimate the weight, unit "g".

Quantity rules:
- Always a positive number. "half" → 0.5. Default when unsure: 1 piece or your best gram estimate.

Food names:
- Lowercase, singular for countable items ("egg" not "eggs").
- When a food is one of the reference foods listed by the user, use that exact name.
- One entry per distinct food; do not invent foods that are not there.
- If there is no food at all, return {"foods": []}.`

const IDENTIFY_PROMPT = `You are a nutrition assistant for a pregnancy food diary. Identify every food visible in the meal photo and estimate its quantity.

${OUTPUT_RULES}`

const DESCRIBE_PROMPT = `You are a nutrition assistant for a pregnancy food diary. Extract every food from the user's description of what they ate.

${OUTPUT_RULES}`

const FoodsSchema = z.object({
  foods: z.array(
    z.object({
      name: z.string().trim(),
      quantity: z.coerce.number().positive().catch(1),
      unit: z
        .string()
        .trim()
        .toLowerCase()
        .catch('serving')
        .transform((u) => u || 'serving'),
    })
  ),
})

/** Parse model output into foods. Missing or mistyped structure is an AnalysisError; an empty list is not. */
export function parseFoodsResponse(content: string): IdentifiedFood[] {
  let json: unknown
  try {
    json = JSON.parse(extractJson(content))
  } catch (e) {
    throw new AnalysisError('Model output is not JSON', { cause: e })
  }
  const parsed = FoodsSchema.safeParse(json)
  if (!parsed.success) {
    throw new AnalysisError(`Model output is missing fields: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`)
  }
  return parsed.data.foods
    .map((f) => ({ name: f.name.toLowerCase(), quantity: f.quantity, unit: f.unit }))
    .filter((f) => isPlausibleFood(f.name))
}

function referenceLine(knownFoods: readonly string[]): string {
  return knownFoods.length ? `Reference foods: ${knownFoods.join(', ')}` : ''
}

/** Identify foods and quantities in a meal photo. */
export async function identifyFoods(
  ai: AiContext,
  image: Uint8Array,
  knownFoods: readonly string[],
  mimeType = 'image/jpeg'
): Promise<IdentifiedFood[]> {
  if (image.byteLength === 0) throw new ValidationError('That photo arrived empty. Please send it again.')
  const parts: ChatCompletionContentPart[] = [
    { type: 'text', text: `${referenceLine(knownFoods)}\n\nIdentify the foods in this photo. Return JSON only:`.trim() },
    { type: 'image_url', image_url: { url: `data:${mimeType};base64,${Buffer.from(image).toString('base64')}` } },
  ]
  const content = await complete(ai, {
    model: ai.visionModel,
    response_format: { type: 'json_object' },
    max_tokens: 500,
    messages: [
      { role: 'system', content: IDENTIFY_PROMPT },
      { role: 'user', content: parts },
    ],
  })
  return parseFoodsResponse(content)
}

/** Same as identifyFoods for a text description ("2 eggs and a slice of toast"). */
export async function describeMeal(ai: AiContext, text: string, knownFoods: readonly string[]): Promise<IdentifiedFood[]> {
  const content = await complete(ai, {
    model: ai.textModel,
    response_format: { type: 'json_object' },
    max_tokens: 500,
    messages: [
      { role: 'system', content: DESCRIBE_PROMPT },
      { role: 'user', content: `${referenceLine(knownFoods)}\n\nUser message: ${text}\n\nReturn JSON only:`.trim() },
    ],
  })
  return parseFoodsResponse(content)
}
