import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { APIError, APIConnectionError } from 'openai'
import { complete, extractJson, isTransient } from './client'
import { AnalysisError } from '../utils/errors'
import { completion, mockAi } from '../../test-utils'

const BODY = { model: 'text-test', messages: [{ role: 'user' as const, content: 'hi' }] }

describe('isTransient', () => {
  it('retries rate limits, timeouts, server errors and lost connections', () => {
    expect(isTransient(new APIError(429, undefined, 'Rate limit', {}))).toBe(true)
    expect(isTransient(new APIError(408, undefined, 'Timeout', {}))).toBe(true)
    expect(isTransient(new APIError(503, undefined, 'Unavailable', {}))).toBe(true)
    expect(isTransient(new APIConnectionError({ message: 'socket hang up' }))).toBe(true)
    expect(isTransient(new Error('fetch failed'))).toBe(true)
  })

  it('does not retry other client errors', () => {
    expect(isTransient(new APIError(400, undefined, 'Invalid image', {}))).toBe(false)
    expect(isTransient(new APIError(401, undefined, 'Incorrect API key', {}))).toBe(false)
  })
})

describe('complete', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('returns the trimmed first choice', async () => {
    const { ai, create } = mockAi()
    create.mockResolvedValue(completion('  Eat some spinach.\n'))

    await expect(complete(ai, BODY)).resolves.toBe('Eat some spinach.')
  })

  it('sends a rejected request only once', async () => {
    const { ai, create } = mockAi()
    create.mockRejectedValue(new APIError(400, undefined, 'Invalid image', {}))

    await expect(complete(ai, BODY)).rejects.toBeInstanceOf(AnalysisError)
    expect(create).toHaveBeenCalledTimes(1)
  })

  it('retries a rate-limited request once', async () => {
    const { ai, create } = mockAi()
    create
      .mockRejectedValueOnce(new APIError(429, undefined, 'Rate limit', {}))
      .mockResolvedValueOnce(completion('ok'))

    await expect(complete(ai, BODY)).resolves.toBe('ok')
    expect(create).toHaveBeenCalledTimes(2)
  })
})

describe('extractJson', () => {
  it('drops text around the object', () => {
    expect(extractJson('Sure! {"foods":[]} Enjoy.')).toBe('{"foods":[]}')
  })

  it('leaves text without an object alone', () => {
    expect(extractJson(' no json ')).toBe('no json')
  })
})
