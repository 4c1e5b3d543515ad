import { toFile } from 'openai'
import { callWithRetry, type AiContext } from '../ai/client'
import { ValidationError } from '../utils/errors'

/** Biases the transcript toward food words the diary can match */
const FOOD_PROMPT = 'Meal log: breakfast, lunch, dinner, snack, eggs, banana, spinach, lentils, yogurt, salmon, toast, rice.'

const UNHEARD_MESSAGE = "I couldn't make out that voice message. Please try again or type what you ate."

/** Transcribe a Telegram voice note (OGG/Opus). */
export async function transcribeVoice(ai: AiContext, audio: Uint8Array, filename = 'voice.ogg'): Promise<string> {
  if (audio.byteLength === 0) throw new ValidationError(UNHEARD_MESSAGE)
  const file = await toFile(Buffer.from(audio), filename, { type: 'audio/ogg' })
  const result = await callWithRetry(ai, ai.transcribeModel, () =>
    ai.client.audio.transcriptions.create({ file, model: ai.transcribeModel, prompt: FOOD_PROMPT })
  )
  const text = result.text.trim()
  if (!text) throw new ValidationError(UNHEARD_MESSAGE)
  return text
}
