import { vi, type Mock } from 'vitest'
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions'
import type { Transcription, TranscriptionCreateParams } from 'openai/resources/audio/transcriptions'
import { loadEnv, type Env } from './env'
import type { AiContext } from './lib/ai/client'
import { parseNutritionReference } from './lib/data/reference'
import type { NutritionReference } from './types'

export function testEnv(overrides: Record<string, string> = {}): Env {
  return loadEnv({ TELEGRAM_BOT_TOKEN: 'test-token', OPENAI_API_KEY: 'test-key', ...overrides })
}

/** Three targets, three foods: enough for every path through lookup and analysis. */
export function testReference(): NutritionReference {
  return parseNutritionReference({
    nutrients: [
      { key: 'calories', label: 'Calories', unit: 'kcal' },
      { key: 'folate', label: 'Folate', unit: 'mcg' },
      { key: 'potassium', label: 'Potassium', unit: 'mg' },
      { key: 'iron', label: 'Iron', unit: 'mg' },
    ],
    pregnancy_targets: { folate: 600, potassium: 2900, iron: 27 },
    foods: [
      {
        name: 'banana',
        aliases: ['bananas'],
        per: { quantity: 1, unit: 'piece' },
        grams_per_unit: 118,
        nutrients: { potassium: 422, folate: 24 },
      },
      {
        name: 'spinach',
        per: { quantity: 100, unit: 'g' },
        nutrients: { calories: 23, folate: 194, iron: 2.7, potassium: 558 },
      },
      {
        name: 'egg',
        aliases: ['boiled egg'],
        per: { quantity: 1, unit: 'piece' },
        grams_per_unit: 50,
        nutrients: { folate: 22, iron: 0.9, potassium: 63 },
      },
    ],
  })
}

export function completion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  }
}

type CreateCompletion = (body: ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletion>
type CreateTranscription = (body: TranscriptionCreateParams) => Promise<Transcription>

/** AiContext over vi.fn chat and transcription clients; retries without delay. */
export function mockAi(): { ai: AiContext; create: Mock<CreateCompletion>; transcribe: Mock<CreateTranscription> } {
  const create = vi.fn<CreateCompletion>()
  const transcribe = vi.fn<CreateTranscription>()
  return {
    ai: {
      client: { chat: { completions: { create } }, audio: { transcriptions: { create: transcribe } } },
      visionModel: 'vision-test',
      textModel: 'text-test',
      transcribeModel: 'transcribe-test',
      retry: { maxAttempts: 2, delayMs: 0 },
    },
    create,
    transcribe,
  }
}
