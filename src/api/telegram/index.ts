import { Hono } from 'hono'
import type { AppEnv } from '../../context'
import { webhookHandler } from './routes'

export const telegramRouter = new Hono<AppEnv>()
  .get('/webhook', (c) => c.text('Webhook OK: POST updates here'))
  .post('/webhook', webhookHandler)
