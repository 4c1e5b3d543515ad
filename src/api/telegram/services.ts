import type { BotDeps } from '../../context'
import { isEchoOnly } from '../../env'
import type { GapReport, IdentifiedFood, Period } from '../../types'
import { sendMessage, getFile, downloadFile } from '../../lib/channels/telegram'
import { classifyMessage, classifyText } from '../../lib/intent/classify'
import { identifyFoods, describeMeal } from '../../lib/food/inputParser'
import { resolveFoods } from '../../lib/food/match'
import { targetsFor } from '../../lib/data/reference'
import { periodRange, summarize } from '../../lib/analysis/summarize'
import { recommend } from '../../lib/ai/recommend'
import { answerQuestion, smallTalk } from '../../lib/ai/assistant'
import { pregnancyStage, type PregnancyStage } from '../../lib/pregnancy/profile'
import { transcribeVoice } from '../../lib/voice'
import { AnalysisError, errorMessage } from '../../lib/utils/errors'
import { parseCommand, type Command } from './commands'
import {
  HELP_MESSAGE,
  NO_FOODS_IN_TEXT_MESSAGE,
  NO_FOODS_MESSAGE,
  formatGapReport,
  formatLoggedMessage,
  replyForError,
  transcriptPrefix,
  welcomeMessage,
} from './replies'
import type { TelegramMessage, TelegramPhotoSize, TelegramUpdate } from './schema'

type CommandHandler = (deps: BotDeps, msg: TelegramMessage, userId: number) => Promise<string>

const COMMAND_HANDLERS: Record<Command, CommandHandler> = {
  start: async (deps, msg) => welcomeMessage(msg.from?.first_name, stageFor(deps)),
  help: async () => HELP_MESSAGE,
  diary: (deps, _msg, userId) => reportFor(deps, userId, 'day'),
  weekly: (deps, _msg, userId) => reportFor(deps, userId, 'week'),
}

function clock(deps: BotDeps): Date {
  return deps.now ? deps.now() : new Date()
}

function stageFor(deps: BotDeps): PregnancyStage | null {
  return deps.env.PREGNANCY_START_DATE ? pregnancyStage(deps.env.PREGNANCY_START_DATE, clock(deps)) : null
}

function gapReport(deps: BotDeps, userId: number, period: Period): GapReport {
  const range = periodRange(period, clock(deps))
  const entries = deps.diary.queryByUserAndRange(userId, range.start, range.end)
  return summarize(userId, entries, targetsFor(deps.reference, period), period, range)
}

async function reportFor(deps: BotDeps, userId: number, period: Period): Promise<string> {
  const report = gapReport(deps, userId, period)
  const recommendation = await recommend(deps.ai, report, deps.reference)
  return formatGapReport(report, deps.reference, recommendation)
}

function largestPhoto(sizes: readonly TelegramPhotoSize[]): TelegramPhotoSize {
  return sizes.reduce((best, p) => (p.width * p.height > best.width * best.height ? p : best))
}

async function downloadTelegramFile(deps: BotDeps, fileId: string): Promise<Uint8Array> {
  try {
    const { file_path } = await getFile(deps.env, fileId)
    return await downloadFile(deps.env, file_path)
  } catch (e) {
    throw new AnalysisError(`Download of ${fileId} failed: ${errorMessage(e)}`, { cause: e })
  }
}

/** Look foods up, store the matches in one transaction, and build the confirmation. */
function logFoods(
  deps: BotDeps,
  userId: number,
  timestamp: number,
  foods: readonly IdentifiedFood[],
  emptyMessage: string
): string {
  if (foods.length === 0) return emptyMessage
  const { entries, unmatched } = resolveFoods(deps.reference, foods, userId, timestamp)
  const stored = entries.length ? deps.diary.insertMany(entries) : []
  console.log('[diary] user=%d stored=%d unmatched=%d', userId, stored.length, unmatched.length)
  return formatLoggedMessage(stored, unmatched, deps.reference)
}

function knownFoods(deps: BotDeps): string[] {
  return deps.reference.foods.map((f) => f.name)
}

/** Typed text or a voice transcript: command, question, meal, or small talk. */
async function respondToText(deps: BotDeps, msg: TelegramMessage, userId: number, text: string): Promise<string> {
  const intent = classifyText(text)
  switch (intent) {
    case 'command': {
      const command = parseCommand(text)
      return command ? COMMAND_HANDLERS[command](deps, msg, userId) : HELP_MESSAGE
    }
    case 'nutrition_question':
      return answerQuestion(deps.ai, text, gapReport(deps, userId, 'day'), deps.reference, stageFor(deps))
    case 'meal_description': {
      const foods = await describeMeal(deps.ai, text, knownFoods(deps))
      return logFoods(deps, userId, msg.date * 1000, foods, NO_FOODS_IN_TEXT_MESSAGE)
    }
    case 'other': {
      if (!text) return HELP_MESSAGE
      const context = { entriesToday: gapReport(deps, userId, 'day').entryCount, stage: stageFor(deps) }
      return smallTalk(deps.ai, text, context, HELP_MESSAGE)
    }
    default: {
      const unhandled: never = intent
      return unhandled
    }
  }
}

/** Reply text for one message. Throws BotError subclasses for the caller to turn into guidance. */
export async function respond(deps: BotDeps, msg: TelegramMessage): Promise<string> {
  const userId = msg.from?.id ?? msg.chat.id
  const text = msg.text?.trim() ?? ''

  if (isEchoOnly(deps.env) && text) return text

  const intent = classifyMessage(msg)
  switch (intent) {
    case 'photo': {
      const sizes = msg.photo ?? []
      const bytes = await downloadTelegramFile(deps, largestPhoto(sizes).file_id)
      const foods = await identifyFoods(deps.ai, bytes, knownFoods(deps))
      console.log('[telegram] photo from user=%d identified %d foods', userId, foods.length)
      return logFoods(deps, userId, msg.date * 1000, foods, NO_FOODS_MESSAGE)
    }
    case 'voice': {
      if (!msg.voice) return HELP_MESSAGE
      const audio = await downloadTelegramFile(deps, msg.voice.file_id)
      const transcript = await transcribeVoice(deps.ai, audio)
      console.log('[telegram] voice from user=%d transcribed (%d chars)', userId, transcript.length)
      return transcriptPrefix(transcript) + (await respondToText(deps, msg, userId, transcript))
    }
    default:
      return respondToText(deps, msg, userId, text)
  }
}

/**
 * Handle one Telegram update to completion. Never throws: a failure is logged and
 * answered with guidance, so one bad update cannot take the bot down.
 */
export async function handleTelegramUpdate(deps: BotDeps, update: TelegramUpdate): Promise<void> {
  const msg = update.message
  if (!msg?.chat?.id) return

  const chatId = msg.chat.id
  const reply = (text: string) =>
    sendMessage(deps.env, chatId, text).catch((e) => console.error('[telegram] sendMessage', errorMessage(e)))

  let text: string
  try {
    text = await respond(deps, msg)
  } catch (e) {
    console.error('[telegram] update_id=%d failed:', update.update_id, e)
    text = replyForError(e)
  }
  await reply(text)
}
