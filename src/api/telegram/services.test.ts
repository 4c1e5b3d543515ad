import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { handleTelegramUpdate } from './services'
import { HELP_MESSAGE, NO_FOODS_IN_TEXT_MESSAGE, NO_FOODS_MESSAGE } from './replies'
import type { TelegramMessage, TelegramUpdate } from './schema'
import { downloadFile, getFile, sendMessage } from '../../lib/channels/telegram'
import { DiaryStore } from '../../lib/data/diary'
import { completion, mockAi, testEnv, testReference } from '../../test-utils'
import type { BotDeps } from '../../context'

vi.mock('../../lib/channels/telegram')

const NOW = new Date(2026, 4, 10, 20, 0)
const SENT_AT = Math.floor(new Date(2026, 4, 10, 12, 0).getTime() / 1000)
const CHAT_ID = 555
const USER_ID = 42

const PHOTO_SIZES = [
  { file_id: 'small', width: 90, height: 90 },
  { file_id: 'large', width: 1280, height: 960 },
  { file_id: 'medium', width: 320, height: 240 },
]

function update(fields: Partial<TelegramMessage>, updateId = 1): TelegramUpdate {
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      from: { id: USER_ID, first_name: 'Sam' },
      chat: { id: CHAT_ID, type: 'private' },
      date: SENT_AT,
      ...fields,
    },
  }
}

function foodsJson(foods: Array<{ name: string; quantity: number; unit: string }>): string {
  return JSON.stringify({ foods })
}

function lastReply(): string | undefined {
  return vi.mocked(sendMessage).mock.calls.at(-1)?.[2]
}

describe('handleTelegramUpdate', () => {
  let deps: BotDeps
  let create: ReturnType<typeof mockAi>['create']
  let transcribe: ReturnType<typeof mockAi>['transcribe']

  function stored() {
    return deps.diary.queryByUserAndRange(USER_ID, 0, Number.MAX_SAFE_INTEGER)
  }

  function setup(envOverrides: Record<string, string> = {}) {
    const mock = mockAi()
    create = mock.create
    transcribe = mock.transcribe
    deps = {
      env: testEnv(envOverrides),
      reference: testReference(),
      diary: new DiaryStore(':memory:'),
      ai: mock.ai,
      now: () => NOW,
    }
  }

  beforeEach(() => {
    vi.resetAllMocks()
    vi.mocked(sendMessage).mockResolvedValue(undefined)
    vi.mocked(getFile).mockResolvedValue({ file_path: 'photos/file_1.jpg' })
    vi.mocked(downloadFile).mockResolvedValue(new Uint8Array([0xff, 0xd8, 0xff]))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    setup()
  })

  afterEach(() => {
    deps.diary.close()
    vi.restoreAllMocks()
  })

  it('logs a banana photo and reports it in /diary', async () => {
    create.mockResolvedValueOnce(completion(foodsJson([{ name: 'banana', quantity: 1, unit: 'piece' }])))

    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    expect(getFile).toHaveBeenCalledWith(deps.env, 'large')
    expect(downloadFile).toHaveBeenCalledWith(deps.env, 'photos/file_1.jpg')
    expect(sendMessage).toHaveBeenCalledWith(
      deps.env,
      CHAT_ID,
      '✅ Logged 1 item:\n• 1 piece banana\n\n📊 Folate 24 mcg\n\nSend /diary to see how today adds up.'
    )
    expect(stored()).toEqual([
      {
        id: 1,
        userId: USER_ID,
        timestamp: SENT_AT * 1000,
        foodName: 'banana',
        quantity: 1,
        unit: 'piece',
        nutrients: { potassium: 422, folate: 24 },
      },
    ])

    create.mockResolvedValueOnce(completion('Add a spinach omelette at dinner.'))
    await handleTelegramUpdate(deps, update({ text: '/diary' }, 2))

    expect(lastReply()).toBe(
      [
        '📊 Today (1 item logged)',
        '',
        '❌ Folate: 24 / 600 mcg (4%)',
        '❌ Potassium: 422 / 2900 mg (15%)',
        '❌ Iron: 0 / 27 mg (0%)',
        '',
        '💡 Recommendations:',
        'Add a spinach omelette at dinner.',
      ].join('\n')
    )
  })

  it('reports the week with weekly targets', async () => {
    create.mockResolvedValueOnce(completion(foodsJson([{ name: 'banana', quantity: 2, unit: 'piece' }])))
    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    create.mockResolvedValueOnce(completion('More leafy greens.'))
    await handleTelegramUpdate(deps, update({ text: '/weekly' }, 2))

    expect(lastReply()?.split('\n').slice(0, 5)).toEqual([
      '📊 Last 7 days (1 item logged)',
      '',
      '❌ Folate: 48 / 4200 mcg (1%)',
      '❌ Potassium: 844 / 20300 mg (4%)',
      '❌ Iron: 0 / 189 mg (0%)',
    ])
  })

  it('stores nothing when no foods are identified', async () => {
    create.mockResolvedValueOnce(completion('{"foods":[]}'))

    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    expect(lastReply()).toBe(NO_FOODS_MESSAGE)
    expect(stored()).toEqual([])
  })

  it('asks to retry when the vision call fails', async () => {
    create.mockRejectedValue(new Error('fetch failed'))

    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    expect(create).toHaveBeenCalledTimes(2)
    expect(lastReply()).toBe("Couldn't analyze that. Please try again in a moment.")
    expect(stored()).toEqual([])
  })

  it('asks to retry when the photo cannot be downloaded', async () => {
    vi.mocked(getFile).mockRejectedValue(new Error('Telegram getFile failed: 400'))

    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    expect(create).not.toHaveBeenCalled()
    expect(lastReply()).toBe("Couldn't analyze that. Please try again in a moment.")
  })

  it('rejects an empty photo', async () => {
    vi.mocked(downloadFile).mockResolvedValue(new Uint8Array(0))

    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    expect(create).not.toHaveBeenCalled()
    expect(lastReply()).toBe('That photo arrived empty. Please send it again.')
  })

  it('logs known foods and lists unknown ones', async () => {
    create.mockResolvedValueOnce(
      completion(
        foodsJson([
          { name: 'banana', quantity: 1, unit: 'piece' },
          { name: 'kimchi', quantity: 50, unit: 'g' },
        ])
      )
    )

    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    expect(stored().map((e) => e.foodName)).toEqual(['banana'])
    expect(lastReply()?.split('\n')).toContain('Not in my nutrition table, so not logged: kimchi')
  })

  it('logs a meal described in text', async () => {
    create.mockResolvedValueOnce(completion(foodsJson([{ name: 'egg', quantity: 2, unit: 'piece' }])))

    await handleTelegramUpdate(deps, update({ text: 'had 2 boiled eggs for breakfast' }))

    expect(create.mock.calls[0][0].model).toBe('text-test')
    expect(stored()).toEqual([
      {
        id: 1,
        userId: USER_ID,
        timestamp: SENT_AT * 1000,
        foodName: 'egg',
        quantity: 2,
        unit: 'piece',
        nutrients: { folate: 44, iron: 1.8, potassium: 126 },
      },
    ])
    expect(lastReply()?.split('\n')[0]).toBe('✅ Logged 1 item:')
  })

  it('answers unknown commands and empty messages with help', async () => {
    await handleTelegramUpdate(deps, update({ text: '/export' }))
    expect(lastReply()).toBe(HELP_MESSAGE)

    await handleTelegramUpdate(deps, update({}, 2))
    expect(lastReply()).toBe(HELP_MESSAGE)
    expect(create).not.toHaveBeenCalled()
  })

  it('replies to small talk through the text model', async () => {
    create.mockResolvedValueOnce(completion('Hi Sam! Send me a photo of your next meal.'))

    await handleTelegramUpdate(deps, update({ text: 'hello there' }))

    expect(lastReply()).toBe('Hi Sam! Send me a photo of your next meal.')
    expect(JSON.stringify(create.mock.calls[0][0].messages)).toContain('She has logged 0 food items today.')
  })

  it('falls back to help when small talk fails', async () => {
    create.mockRejectedValue(new Error('fetch failed'))

    await handleTelegramUpdate(deps, update({ text: 'hello there' }))

    expect(lastReply()).toBe(HELP_MESSAGE)
  })

  it('says what to type when a described meal has no foods', async () => {
    create.mockResolvedValueOnce(completion('{"foods":[]}'))

    await handleTelegramUpdate(deps, update({ text: 'had something for lunch' }))

    expect(lastReply()).toBe(NO_FOODS_IN_TEXT_MESSAGE)
    expect(stored()).toEqual([])
  })

  it('answers a nutrition question from today\'s diary and the pregnancy week', async () => {
    deps.diary.close()
    setup({ PREGNANCY_START_DATE: '2026-01-01' })
    create.mockResolvedValueOnce(completion(foodsJson([{ name: 'banana', quantity: 1, unit: 'piece' }])))
    await handleTelegramUpdate(deps, update({ photo: PHOTO_SIZES }))

    create.mockResolvedValueOnce(completion('Add spinach and lentils for folate and iron.'))
    await handleTelegramUpdate(deps, update({ text: 'What am I missing today?' }, 2))

    expect(lastReply()).toBe('Add spinach and lentils for folate and iron.')
    const prompt = JSON.stringify(create.mock.calls[1][0].messages)
    expect(prompt).toContain('She is in week 18 (second trimester).')
    expect(prompt).toContain('- Folate: 576 mcg below target')
    expect(prompt).toContain('What am I missing today?')
  })

  it('answers a nutrition question from the template when the model fails', async () => {
    create.mockRejectedValue(new Error('fetch failed'))

    await handleTelegramUpdate(deps, update({ text: 'what should I eat?' }))

    expect(lastReply()).toBe(
      [
        'Today so far: 0 items logged.',
        '',
        'Focus on:',
        '• Potassium: 2900 mg to go (try spinach, banana, egg)',
        '• Folate: 600 mcg to go (try spinach, banana, egg)',
        '• Iron: 27 mg to go (try spinach, egg)',
      ].join('\n')
    )
  })

  it('transcribes a voice note and logs the meal in it', async () => {
    transcribe.mockResolvedValueOnce({ text: 'I had two boiled eggs' })
    create.mockResolvedValueOnce(completion(foodsJson([{ name: 'egg', quantity: 2, unit: 'piece' }])))

    await handleTelegramUpdate(deps, update({ voice: { file_id: 'voice-1', duration: 3 } }))

    expect(getFile).toHaveBeenCalledWith(deps.env, 'voice-1')
    expect(lastReply()?.split('\n').slice(0, 3)).toEqual(['🎤 "I had two boiled eggs"', '', '✅ Logged 1 item:'])
    expect(stored().map((e) => [e.foodName, e.quantity])).toEqual([['egg', 2]])
  })

  it('asks to resend a voice note with no words', async () => {
    transcribe.mockResolvedValueOnce({ text: '' })

    await handleTelegramUpdate(deps, update({ voice: { file_id: 'voice-1' } }))

    expect(lastReply()).toBe("I couldn't make out that voice message. Please try again or type what you ate.")
    expect(create).not.toHaveBeenCalled()
  })

  it('shows the pregnancy week in /start', async () => {
    deps.diary.close()
    setup({ PREGNANCY_START_DATE: '2026-01-01' })

    await handleTelegramUpdate(deps, update({ text: '/start' }))

    expect(lastReply()?.split('\n').slice(0, 2)).toEqual([
      '👋 Hi Sam! I track what you eat during pregnancy.',
      "🤰 You're in week 18 (second trimester).",
    ])
  })

  it('echoes text in echo-only mode', async () => {
    deps.diary.close()
    setup({ TELEGRAM_ECHO_ONLY: 'true' })

    await handleTelegramUpdate(deps, update({ text: 'had a banana' }))

    expect(lastReply()).toBe('had a banana')
    expect(create).not.toHaveBeenCalled()
  })

  it('replies with the diary error when the store fails', async () => {
    const broken = new DiaryStore(':memory:')
    broken.close()

    await handleTelegramUpdate({ ...deps, diary: broken }, update({ text: '/diary' }))

    expect(lastReply()).toBe('Something went wrong saving or reading your diary; try again later.')
  })

  it('does not throw when the reply cannot be sent', async () => {
    vi.mocked(sendMessage).mockRejectedValue(new Error('Telegram sendMessage failed: 403'))

    await expect(handleTelegramUpdate(deps, update({ text: '/help' }))).resolves.toBeUndefined()
  })

  it('ignores updates without a message', async () => {
    await handleTelegramUpdate(deps, { update_id: 9 })

    expect(sendMessage).not.toHaveBeenCalled()
  })
})
