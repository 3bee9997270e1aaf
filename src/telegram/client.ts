import { z } from 'zod';
import { DeliveryError } from '../errors.js';
import type { TelegramMessage, TelegramUpdate } from '../types.js';
import { getErrorMessage, isAbortError, truncate } from '../utils.js';

interface TelegramConfig {
  apiBase: string;
  token: string;
  requestTimeoutMs?: number;
}

interface SendMessageOptions {
  keyboard?: string[][];
}

const messageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({
    id: z.number(),
    type: z.string().optional(),
  }),
  date: z.number().optional(),
  text: z.string().optional(),
});

const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
});

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export class TelegramClient {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

  private readonly apiBase: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;

  constructor(config: TelegramConfig) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.token = config.token;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? TelegramClient.DEFAULT_REQUEST_TIMEOUT_MS);
  }

  async sendMessage(chatId: string, text: string, options: SendMessageOptions = {}): Promise<TelegramMessage> {
    const payload: Record<string, unknown> = { chat_id: chatId, text };
    if (options.keyboard && options.keyboard.length > 0) {
      payload.reply_markup = {
        keyboard: options.keyboard.map((row) => row.map((label) => ({ text: label }))),
        resize_keyboard: true,
      };
    }
    return this.call('sendMessage', payload, messageSchema);
  }

  async editMessageText(chatId: string, messageId: number, text: string): Promise<void> {
    // Returns the edited Message, or `true` for inline messages; neither is needed.
    await this.call('editMessageText', { chat_id: chatId, message_id: messageId, text }, z.unknown());
  }

  /** Long poll; `timeoutSec` is how long Telegram may hold the request open. */
  async getUpdates(offset: number | null, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const payload: Record<string, unknown> = {
      timeout: timeoutSec,
      allowed_updates: ['message'],
    };
    if (offset !== null) {
      payload.offset = offset;
    }
    return this.call('getUpdates', payload, z.array(updateSchema), timeoutSec * 1000 + this.requestTimeoutMs, signal);
  }

  private async call<T>(
    method: string,
    payload: Record<string, unknown>,
    resultSchema: z.ZodType<T>,
    timeoutMs = this.requestTimeoutMs,
    signal?: AbortSignal,
  ): Promise<T> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.apiBase}/bot${this.token}/${method}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        const reason = signal?.aborted ? 'aborted' : `timed out after ${timeoutMs}ms`;
        throw new DeliveryError(`Telegram ${method} ${reason}`);
      }
      throw new DeliveryError(`Telegram ${method} failed: ${getErrorMessage(error)}`);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    const body = await response.text();
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      throw new DeliveryError(`Telegram ${method} failed: ${response.status} ${truncate(body.trim(), 200)}`, response.status);
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new DeliveryError(`Unexpected Telegram ${method} response: ${envelope.error.message}`, response.status);
    }
    if (!response.ok || !envelope.data.ok) {
      const description = envelope.data.description ?? 'no description';
      throw new DeliveryError(
        `Telegram ${method} failed: ${envelope.data.error_code ?? response.status} ${description}`,
        envelope.data.error_code ?? response.status,
      );
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new DeliveryError(`Unexpected Telegram ${method} result: ${result.error.message}`, response.status);
    }
    return result.data;
  }
}
