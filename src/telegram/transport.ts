import type { DeliveryTransport } from '../types.js';
import type { TelegramClient } from './client.js';

/** Binds the client to the one destination chat. */
export function createTelegramTransport(
  client: Pick<TelegramClient, 'sendMessage' | 'editMessageText'>,
  chatId: string,
): DeliveryTransport {
  return {
    async deliver(text, options) {
      const message = await client.sendMessage(chatId, text, { keyboard: options?.keyboard });
      return { chatId, messageId: message.message_id };
    },
    async edit(handle, text) {
      await client.editMessageText(handle.chatId, handle.messageId, text);
    },
  };
}
