import OpenAI, { APIError } from 'openai'
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions'
import type { Transcription, TranscriptionCreateParams } from 'openai/resources/audio/transcriptions'
import type { Env } from '../../env'
import { AnalysisError, errorMessage } from '../utils/errors'
import { withRetry, type RetryOptions } from '../utils/retry'

/** The slice of the OpenAI SDK the bot uses; tests pass vi.fn stand-ins here. */
export interface AiClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>
    }
  }
  audio: {
    transcriptions: {
      create(body: TranscriptionCreateParams): Promise<Transcription>
    }
  }
}

export interface AiContext {
  client: AiClient
  visionModel: string
  textModel: string
  transcribeModel: string
  /** One retry after a fixed delay unless overridden */
  retry?: RetryOptions
}

const DEFAULT_RETRY: RetryOptions = { maxAttempts: 2, delayMs: 1000 }

export function createAiContext(env: Env): AiContext {
  const client = new OpenAI({
    apiKey: env.OPENAI_API_KEY,
    timeout: env.OPENAI_TIMEOUT_MS,
    // retries are ours (withRetry), so a failed call is attempted at most twice
    maxRetries: 0,
  })
  return {
    client,
    visionModel: env.OPENAI_VISION_MODEL,
    textModel: env.OPENAI_TEXT_MODEL,
    transcribeModel: env.OPENAI_TRANSCRIBE_MODEL,
  }
}

/** Network errors, timeouts, rate limits and 5xx are worth a second try; other 4xx are not. */
export function isTransient(e: unknown): boolean {
  if (!(e instanceof APIError) || e.status === undefined) return true
  return e.status === 408 || e.status === 429 || e.status >= 500
}

/** Run an OpenAI call with the context's retry policy; any failure becomes AnalysisError. */
export async function callWithRetry<T>(ai: AiContext, label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await withRetry(fn, { ...DEFAULT_RETRY, shouldRetry: isTransient, ...ai.retry })
  } catch (e) {
    console.error('[ai] %s request failed:', label, errorMessage(e))
    throw new AnalysisError(`${label} failed: ${errorMessage(e)}`, { cause: e })
  }
}

/**
 * Run one chat completion and return the first choice's text.
 * Network failures, non-2xx responses and empty output become AnalysisError.
 */
export async function complete(ai: AiContext, body: ChatCompletionCreateParamsNonStreaming): Promise<string> {
  const response = await callWithRetry(ai, body.model, () => ai.client.chat.completions.create(body))
  const content = response.choices[0]?.message?.content?.trim() ?? ''
  if (!content) throw new AnalysisError(`Empty response from ${body.model}`)
  return content
}

/** Strip anything around the outermost JSON object (markdown fences, chatter). */
export function extractJson(text: string): string {
  const trimmed = text.trim()
  const start = trimmed.indexOf('{')
  const end = trimmed.lastIndexOf('}') + 1
  if (start === -1 || end <= start) return trimmed
  return trimmed.slice(start, end)
}
