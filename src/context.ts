import type { Env } from './env'
import type { NutritionReference } from './types'
import type { AiContext } from './lib/ai/client'
import type { DiaryStore } from './lib/data/diary'

/** Everything an update handler needs. Built once at startup and shared read-only. */
export interface BotDeps {
  env: Env
  reference: NutritionReference
  diary: DiaryStore
  ai: AiContext
  /** Clock for /diary and /weekly ranges */
  now?: () => Date
}

/** Hono environment: deps are attached to every request by createApp. */
export interface AppEnv {
  Variables: { deps: BotDeps }
}
