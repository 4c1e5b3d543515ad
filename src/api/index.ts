import { Hono } from 'hono'
import type { AppEnv } from '../context'
import { telegramRouter } from './telegram'

export const api = new Hono<AppEnv>().basePath('/api').route('/telegram', telegramRouter)
