import type { Context } from 'hono'
import type { AppEnv } from '../../context'
import { handleTelegramUpdate } from './services'
import type { TelegramUpdate } from './schema'

const SECRET_HEADER = 'X-Telegram-Bot-Api-Secret-Token'

function isUpdate(body: unknown): body is TelegramUpdate {
  return typeof body === 'object' && body !== null && 'update_id' in body && typeof body.update_id === 'number'
}

/** POST /api/telegram/webhook: one Telegram update per request (registered via setWebhook). */
export async function webhookHandler(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps')
  const secret = deps.env.TELEGRAM_WEBHOOK_SECRET
  if (secret && c.req.header(SECRET_HEADER) !== secret) {
    return c.json({ ok: false }, 401)
  }
  let update: unknown
  try {
    update = await c.req.json()
  } catch {
    return c.json({ ok: false }, 400)
  }
  if (!isUpdate(update)) return c.json({ ok: false }, 400)
  console.log('[telegram] webhook update_id=%s', update.update_id)
  await handleTelegramUpdate(deps, update)
  return c.json({ ok: true })
}
