/** Telegram update payload (minimal for our handler). */
export interface TelegramUpdate {
  update_id: number
  message?: TelegramMessage
}

export interface TelegramPhotoSize {
  file_id: string
  file_unique_id?: string
  width: number
  height: number
  file_size?: number
}

export interface TelegramMessage {
  message_id: number
  from?: { id: number; is_bot?: boolean; first_name?: string; username?: string }
  chat: { id: number; type: string }
  /** Unix seconds */
  date: number
  text?: string
  caption?: string
  /** Available sizes of one photo, smallest first */
  photo?: TelegramPhotoSize[]
  voice?: { file_id: string; duration?: number }
}
