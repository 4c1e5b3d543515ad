import { z } from 'zod'

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined))

/** "2026-02-30" matches the pattern but is not a day; Date would roll it into March. */
function isCalendarDate(value: string): boolean {
  const [y, m, d] = value.split('-').map(Number)
  const date = new Date(Date.UTC(y, m - 1, d))
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d
}

const EnvSchema = z.object({
  /** Telegram */
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  /** polling: long-poll getUpdates (default). webhook: Telegram POSTs to /api/telegram/webhook. */
  TELEGRAM_MODE: z.enum(['polling', 'webhook']).default('polling'),
  /** Base URL for webhook (e.g. https://bot.example.com). Used by POST /admin/telegram-set-webhook. */
  TELEGRAM_WEBHOOK_BASE_URL: optionalString,
  /** Sent back by Telegram in X-Telegram-Bot-Api-Secret-Token; webhook requests without it are rejected. */
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  /** If set (e.g. "true"), bot only echoes the message back; no meal logging. For local testing. */
  TELEGRAM_ECHO_ONLY: optionalString,

  /** OpenAI: vision model identifies foods in photos, text model phrases recommendations. */
  OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_VISION_MODEL: z.string().trim().min(1).default('gpt-4o'),
  OPENAI_TEXT_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  /** Speech-to-text for voice messages */
  OPENAI_TRANSCRIBE_MODEL: z.string().trim().min(1).default('whisper-1'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),

  /** SQLite diary file and the static nutrition reference. */
  DIARY_DB_PATH: z.string().trim().min(1).default('data/diary.db'),
  NUTRITION_REFERENCE_PATH: z.string().trim().min(1).default('data/nutrition_reference.json'),

  /** First day of pregnancy (YYYY-MM-DD). Enables week/trimester in /start. */
  PREGNANCY_START_DATE: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
    z
      .string()
      .trim()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'PREGNANCY_START_DATE must be YYYY-MM-DD')
      .refine(isCalendarDate, 'PREGNANCY_START_DATE is not a calendar date')
      .optional()
  ),

  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  /** Optional: require Authorization: Bearer <ADMIN_SECRET> for /admin/* */
  ADMIN_SECRET: optionalString,
})

export type Env = z.infer<typeof EnvSchema>

/** Validate process environment. Throws with every failing variable listed. */
export function loadEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`)
  }
  return result.data
}

export function isEchoOnly(env: Pick<Env, 'TELEGRAM_ECHO_ONLY'>): boolean {
  return env.TELEGRAM_ECHO_ONLY === 'true' || env.TELEGRAM_ECHO_ONLY === '1'
}
