export type Intent = 'photo' | 'voice' | TextIntent

export type TextIntent = 'command' | 'nutrition_question' | 'meal_description' | 'other'

/** What the front end needs to see of an incoming message */
export interface IncomingMessage {
  text?: string
  photo?: readonly unknown[]
  voice?: unknown
}

/** Questions about intake or the pregnancy itself. Checked before meal words: "what should I eat" is a question. */
const QUESTION_PHRASES = [
  'nutrient', 'missing', 'what should i eat', 'what do i need', 'what else should',
  'recommend', 'suggestion', 'deficien', 'low in', 'need more', 'enough',
  'pregnancy week', 'which week', 'what week', 'trimester', 'how far along',
]

const MEAL_INDICATORS = [
  'ate', 'had', 'eaten', 'eating', 'breakfast', 'lunch', 'dinner', 'snack', 'meal',
  'cup', 'slice', 'bowl', 'glass', 'piece', 'grams',
  'egg', 'banana', 'apple', 'orange', 'bread', 'toast', 'rice', 'oats', 'oatmeal', 'porridge',
  'chicken', 'salmon', 'fish', 'spinach', 'broccoli', 'lentil', 'dal', 'milk', 'yogurt', 'cheese',
  'avocado', 'almond', 'potato', 'salad', 'soup', 'sandwich', 'pasta',
]

function hasWord(text: string, word: string): boolean {
  return new RegExp(`\\b${word}`, 'i').test(text)
}

/** Rough keyword check: does a free-text message describe something eaten? */
export function looksLikeMeal(text: string): boolean {
  const t = text.trim().toLowerCase()
  if (!t) return false
  if (/\b\d+(\.\d+)?\s?(g|ml)\b/.test(t)) return true
  return MEAL_INDICATORS.some((w) => hasWord(t, w))
}

export function looksLikeQuestion(text: string): boolean {
  const t = text.trim().toLowerCase()
  return QUESTION_PHRASES.some((p) => t.includes(p))
}

/** Route typed or transcribed text. */
export function classifyText(text: string): TextIntent {
  const t = text.trim()
  if (t.startsWith('/')) return 'command'
  if (looksLikeQuestion(t)) return 'nutrition_question'
  if (looksLikeMeal(t)) return 'meal_description'
  return 'other'
}

/** No LLM: route on message shape and keywords only. */
export function classifyMessage(message: IncomingMessage): Intent {
  if (message.photo && message.photo.length > 0) return 'photo'
  if (message.voice) return 'voice'
  return classifyText(message.text ?? '')
}
