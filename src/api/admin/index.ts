import { Hono } from 'hono'
import type { MiddlewareHandler } from 'hono'
import type { AppEnv } from '../../context'
import { getWebHookInfo, setWebHook } from '../../lib/channels/telegram'
import { errorMessage } from '../../lib/utils/errors'

/** Require Authorization: Bearer <ADMIN_SECRET> when ADMIN_SECRET is set. */
const requireAdmin: MiddlewareHandler<AppEnv> = async (c, next) => {
  const secret = c.get('deps').env.ADMIN_SECRET
  if (secret && c.req.header('Authorization') !== `Bearer ${secret}`) {
    return c.json({ error: 'Unauthorized' }, 401)
  }
  await next()
}

export const adminRouter = new Hono<AppEnv>()
  .use('*', requireAdmin)
  .post('/telegram-set-webhook', async (c) => {
    const { env } = c.get('deps')
    if (!env.TELEGRAM_WEBHOOK_BASE_URL) {
      return c.json({ error: 'TELEGRAM_WEBHOOK_BASE_URL is not set' }, 400)
    }
    const url = `${env.TELEGRAM_WEBHOOK_BASE_URL.replace(/\/$/, '')}/api/telegram/webhook`
    try {
      await setWebHook(env, url, env.TELEGRAM_WEBHOOK_SECRET)
      return c.json({ ok: true, url })
    } catch (e) {
      console.error('[admin] setWebhook error', e)
      return c.json({ error: errorMessage(e) }, 500)
    }
  })
  .get('/telegram-webhook-info', async (c) => {
    try {
      return c.json({ ok: true, ...(await getWebHookInfo(c.get('deps').env)) })
    } catch (e) {
      console.error('[admin] getWebhookInfo error', e)
      return c.json({ error: errorMessage(e) }, 500)
    }
  })
