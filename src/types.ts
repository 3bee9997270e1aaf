import type { Verdict } from './homework/verdicts.js';

/** Lower bound (epoch seconds) of the next `from_date` fetch window. */
export type Cursor = number;

export interface StatusEnvelope {
  homeworks: unknown[];
  currentDate: Cursor | null;
}

export interface StatusRecord {
  id: string;
  verdictCode: string;
  lastUpdate?: number;
}

export interface InterpretedStatus {
  subjectId: string;
  verdict: Verdict;
  text: string;
  lastUpdate: number | null;
}

export type FetchStatuses = (fromDate: Cursor) => Promise<unknown>;

export interface MessageHandle {
  chatId: string;
  messageId: number;
}

export interface DeliveryOptions {
  /** Reply keyboard rows; each string becomes one button. */
  keyboard?: string[][];
}

export interface DeliveryTransport {
  deliver(text: string, options?: DeliveryOptions): Promise<MessageHandle>;
  edit?(handle: MessageHandle, text: string): Promise<void>;
}

export interface TelegramChat {
  id: number;
  type?: string;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  date?: number;
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}
