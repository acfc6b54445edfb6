// ============================================================================
// Review Bot Error Types
// ============================================================================

/**
 * Telegram answered with ok: false or a non-2xx status.
 * The message carries Telegram's description, never the bot token.
 */
export class TelegramApiError extends Error {
  readonly method: string;
  readonly statusCode: number;

  constructor(method: string, statusCode: number, description: string) {
    super(`Telegram ${method} failed (${statusCode}): ${description}`);
    this.name = 'TelegramApiError';
    this.method = method;
    this.statusCode = statusCode;
  }
}

/**
 * The review API answered with a non-2xx status. `message` is the API's
 * `error` field, or the raw response text when the body is not JSON.
 */
export class ReviewApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ReviewApiError';
    this.statusCode = statusCode;
  }
}
