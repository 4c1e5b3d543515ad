import type { Env } from '../../env'
import type { TelegramUpdate } from '../../api/telegram/schema'

const TELEGRAM_API = 'https://api.telegram.org'
const REQUEST_TIMEOUT_MS = 30_000

type TelegramEnv = Pick<Env, 'TELEGRAM_BOT_TOKEN'>

interface TelegramResponse<T> {
  ok: boolean
  result?: T
  error_code?: number
  description?: string
}

async function call<T>(env: TelegramEnv, method: string, body: Record<string, unknown>, timeoutMs = REQUEST_TIMEOUT_MS): Promise<T> {
  const url = `${TELEGRAM_API}/bot${env.TELEGRAM_BOT_TOKEN}/${method}`
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  })
  if (!res.ok) {
    const err = await res.text()
    throw new Error(`Telegram ${method} failed: ${res.status} ${err}`)
  }
  const data = (await res.json()) as TelegramResponse<T>
  if (!data.ok || data.result === undefined) {
    const code = data.error_code ?? ''
    const msg = data.description ?? `${method} returned ok: false`
    throw new Error(`Telegram ${method} failed (${code}): ${msg}`)
  }
  return data.result
}

export async function sendMessage(env: TelegramEnv, chatId: number, text: string): Promise<void> {
  await call(env, 'sendMessage', { chat_id: chatId, text })
}

export async function getFile(env: TelegramEnv, fileId: string): Promise<{ file_path: string }> {
  const result = await call<{ file_path?: string }>(env, 'getFile', { file_id: fileId })
  if (!result.file_path) throw new Error('Invalid getFile response')
  return { file_path: result.file_path }
}

export async function downloadFile(env: TelegramEnv, filePath: string): Promise<Uint8Array> {
  const url = `${TELEGRAM_API}/file/bot${env.TELEGRAM_BOT_TOKEN}/${filePath}`
  const res = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) })
  if (!res.ok) throw new Error(`Download file failed: ${res.status}`)
  return new Uint8Array(await res.arrayBuffer())
}

/** Long-poll for updates. `timeoutSec` is how long Telegram holds the request open. */
export async function getUpdates(
  env: TelegramEnv,
  offset: number | undefined,
  timeoutSec = 30,
  signal?: AbortSignal
): Promise<TelegramUpdate[]> {
  const url = `${TELEGRAM_API}/bot${env.TELEGRAM_BOT_TOKEN}/getUpdates`
  const controller = new AbortController()
  const abort = () => controller.abort()
  const timer = setTimeout(abort, REQUEST_TIMEOUT_MS + timeoutSec * 1000)
  signal?.addEventListener('abort', abort, { once: true })
  let res: Response
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ offset, timeout: timeoutSec, allowed_updates: ['message'] }),
      signal: controller.signal,
    })
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', abort)
  }
  if (!res.ok) throw new Error(`Telegram getUpdates failed: ${res.status} ${await res.text()}`)
  const data = (await res.json()) as TelegramResponse<TelegramUpdate[]>
  if (!data.ok) throw new Error(`Telegram getUpdates failed (${data.error_code ?? ''}): ${data.description ?? ''}`)
  return data.result ?? []
}

/** Get current webhook info (for debugging). */
export async function getWebHookInfo(env: TelegramEnv): Promise<{ url: string; pending_update_count?: number }> {
  const result = await call<{ url?: string; pending_update_count?: number }>(env, 'getWebhookInfo', {})
  return { url: result.url ?? '', pending_update_count: result.pending_update_count }
}

/** Set webhook URL. Telegram only allows ports 443, 80, 88, 8443 (HTTPS). */
export async function setWebHook(env: TelegramEnv, webhookUrl: string, secretToken?: string, maxConnections = 40): Promise<void> {
  await call<boolean>(env, 'setWebhook', {
    url: webhookUrl,
    max_connections: maxConnections,
    allowed_updates: ['message'],
    ...(secretToken && { secret_token: secretToken }),
  })
}

/** Polling and a webhook are mutually exclusive on Telegram's side. */
export async function deleteWebHook(env: TelegramEnv): Promise<void> {
  await call<boolean>(env, 'deleteWebhook', { drop_pending_updates: false })
}
