import 'dotenv/config'
import { serve } from '@hono/node-server'
import type { BotDeps } from './context'
import { loadEnv } from './env'
import { createApp } from './index'
import { createAiContext } from './lib/ai/client'
import { DiaryStore } from './lib/data/diary'
import { loadNutritionReference } from './lib/data/reference'
import { startPolling } from './api/telegram/polling'
import { errorMessage } from './lib/utils/errors'

async function main(): Promise<void> {
  const env = loadEnv(process.env)
  const deps: BotDeps = {
    env,
    reference: loadNutritionReference(env.NUTRITION_REFERENCE_PATH),
    diary: new DiaryStore(env.DIARY_DB_PATH),
    ai: createAiContext(env),
  }

  const app = createApp(deps)
  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    console.log('[server] listening on :%d (%s mode)', info.port, env.TELEGRAM_MODE)
  })

  const controller = new AbortController()
  const polling = env.TELEGRAM_MODE === 'polling' ? startPolling(deps, controller.signal) : Promise.resolve()

  const shutdown = async (signal: string) => {
    console.log('[server] %s received, shutting down', signal)
    controller.abort()
    server.close()
    try {
      await polling
    } catch (e) {
      console.error('[telegram] polling ended with error:', errorMessage(e))
    } finally {
      deps.diary.close()
      process.exit(0)
    }
  }
  process.once('SIGINT', () => void shutdown('SIGINT'))
  process.once('SIGTERM', () => void shutdown('SIGTERM'))

  await polling
}

main().catch((e) => {
  console.error('[server] fatal:', e)
  process.exit(1)
})
