export type BotErrorCode = 'ANALYSIS_ERROR' | 'STORE_ERROR' | 'VALIDATION_ERROR'

/**
 * Base for errors that end up as a chat reply. `safeMessage` is what the user sees;
 * `message` and `cause` are for the log.
 */
export class BotError extends Error {
  constructor(
    public readonly code: BotErrorCode,
    message: string,
    public readonly safeMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'BotError'
  }
}

/** Model call failed: network, non-2xx, or output we could not parse. The user should retry. */
export class AnalysisError extends BotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANALYSIS_ERROR', message, "Couldn't analyze that. Please try again in a moment.", options)
    this.name = 'AnalysisError'
  }
}

/** Diary database failure (disk, permissions, corrupt file). */
export class StoreError extends BotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_ERROR', message, 'Something went wrong saving or reading your diary; try again later.', options)
    this.name = 'StoreError'
  }
}

/** Bad input from the user (empty photo, unsupported message). safeMessage is the guidance reply. */
export class ValidationError extends BotError {
  constructor(safeMessage: string) {
    super('VALIDATION_ERROR', safeMessage, safeMessage)
    this.name = 'ValidationError'
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
