import type { BotDeps } from '../../context'
import { deleteWebHook, getUpdates } from '../../lib/channels/telegram'
import { errorMessage } from '../../lib/utils/errors'
import type { TelegramUpdate } from './schema'
import { handleTelegramUpdate } from './services'

const ERROR_BACKOFF_MS = 5_000

export interface PollOptions {
  signal: AbortSignal
  /** Long-poll window in seconds */
  timeoutSec?: number
  fetchUpdates?: typeof getUpdates
  handle?: (deps: BotDeps, update: TelegramUpdate) => Promise<void>
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Long-poll Telegram and handle updates one at a time, in order, until the signal aborts.
 * The offset only advances past an update after it has been handled.
 */
export async function pollUpdates(deps: BotDeps, options: PollOptions): Promise<void> {
  const fetchUpdates = options.fetchUpdates ?? getUpdates
  const handle = options.handle ?? handleTelegramUpdate
  let offset: number | undefined
  console.log('[telegram] polling for updates')
  while (!options.signal.aborted) {
    let updates: TelegramUpdate[]
    try {
      updates = await fetchUpdates(deps.env, offset, options.timeoutSec ?? 30, options.signal)
    } catch (e) {
      if (options.signal.aborted) break
      console.error('[telegram] getUpdates failed:', errorMessage(e))
      await wait(ERROR_BACKOFF_MS, options.signal)
      continue
    }
    for (const update of updates) {
      await handle(deps, update)
      offset = update.update_id + 1
    }
  }
  console.log('[telegram] polling stopped')
}

/** Switch Telegram from webhook delivery to getUpdates. */
export async function startPolling(deps: BotDeps, signal: AbortSignal): Promise<void> {
  await deleteWebHook(deps.env)
  await pollUpdates(deps, { signal })
}
