import { Hono } from 'hono'
import type { AppEnv, BotDeps } from './context'
import { api } from './api'
import { adminRouter } from './api/admin'

/** HTTP surface: health, Telegram webhook, admin. Deps are attached to every request. */
export function createApp(deps: BotDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>()
  app.use('*', async (c, next) => {
    c.set('deps', deps)
    await next()
  })
  app.get('/', (c) => c.text('Pregnancy nutrition bot'))
  app.route('/', api)
  app.route('/admin', adminRouter)
  return app
}
