import { z } from 'zod';
import { getEnv } from '../config/env.js';
import { getComponentLogger, getLogger } from '../lib/logger.js';
import { withRetry, type RetryOptions } from '../lib/retry.js';
import type { Messenger, SentMessage } from '../monitor/types.js';

// ─── Error Classes ───────────────────────────────────────────────────────────

export class TelegramApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly description?: string,
  ) {
    super(message);
    this.name = 'TelegramApiError';
  }
}

// ─── Response Schemas ────────────────────────────────────────────────────────

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const messageSchema = z.object({
  message_id: z.number(),
});

// Editing to identical text is rejected by the API but leaves the message as wanted
const NOT_MODIFIED = 'message is not modified';

export interface TelegramClientOptions {
  token: string;
  baseUrl: string;
  retry?: RetryOptions;
}

function preview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}

export class TelegramClient implements Messenger {
  constructor(private readonly options: TelegramClientOptions) {}

  private async call(method: string, payload: Record<string, unknown>): Promise<unknown> {
    const base = this.options.baseUrl.replace(/\/$/, '');
    const response = await fetch(`${base}/bot${this.options.token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    const parsed = apiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TelegramApiError(`Telegram ${method}: unexpected response body`, response.status);
    }

    const body = parsed.data;
    if (!response.ok || !body.ok) {
      throw new TelegramApiError(
        `Telegram ${method} failed: ${body.error_code ?? response.status} ${body.description ?? response.statusText}`,
        body.error_code ?? response.status,
        body.description,
      );
    }

    return body.result;
  }

  /**
   * Send a message; null once every attempt has failed.
   */
  async sendMessage(text: string, chatId: number): Promise<SentMessage | null> {
    try {
      const message = await withRetry(
        async () => messageSchema.parse(await this.call('sendMessage', { chat_id: chatId, text })),
        { ...this.options.retry, context: { chatId, method: 'sendMessage' } },
      );

      getComponentLogger('messages').info({ chatId, messageId: message.message_id }, `Message sent: ${preview(text)}`);
      return { messageId: message.message_id };
    } catch (err) {
      getLogger().error({ err, chatId }, 'Failed to send message');
      return null;
    }
  }

  /**
   * Replace the text of a sent message; false once every attempt has failed.
   */
  async editMessage(chatId: number, messageId: number, text: string): Promise<boolean> {
    try {
      await withRetry(
        async () => {
          try {
            await this.call('editMessageText', { chat_id: chatId, message_id: messageId, text });
          } catch (err) {
            if (err instanceof TelegramApiError && err.description?.includes(NOT_MODIFIED)) return;
            throw err;
          }
        },
        { ...this.options.retry, context: { chatId, messageId, method: 'editMessageText' } },
      );

      getComponentLogger('messages').info({ chatId, messageId }, `Message edited: ${preview(text)}`);
      return true;
    } catch (err) {
      getLogger().error({ err, chatId, messageId }, 'Failed to edit message');
      return false;
    }
  }
}

export function createTelegramClient(): TelegramClient {
  const env = getEnv();
  return new TelegramClient({ token: env.TELEGRAM_BOT_TOKEN, baseUrl: env.TELEGRAM_API_BASE_URL });
}
