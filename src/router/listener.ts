import { logError, logInfo, logWarn } from '../logger.js';
import type { Notifier } from '../notifier.js';
import type { TelegramClient } from '../telegram/client.js';
import type { FetchStatuses, TelegramUpdate } from '../types.js';
import { nowSec, sleep } from '../utils.js';
import { STATUS_KEYBOARD, helpText, parseCommand, promptText } from './commands.js';
import { renderStatusReport } from './statusReport.js';

const NUMERIC_CHAT_ID = /^-?\d+$/;

interface CommandListenerDeps {
  telegram: Pick<TelegramClient, 'getUpdates'>;
  notifier: Pick<Notifier, 'reply'>;
  fetchStatuses: FetchStatuses;
  chatId: string;
  longPollTimeoutSec: number;
  errorBackoffMs: number;
  statusLookbackSec: number;
  discardBacklogOnStart: boolean;
  now?: () => number;
}

/**
 * Interactive channel: long-polls Telegram for messages from the configured
 * chat and answers status requests. Shares nothing with the scheduler except
 * the notifier.
 */
export class CommandListener {
  private running = false;
  private offset: number | null = null;
  private controller = new AbortController();
  private loopDone: Promise<void> = Promise.resolve();

  constructor(private readonly deps: CommandListenerDeps) {}

  start(): Promise<void> {
    if (this.running) {
      return this.loopDone;
    }
    // Updates carry the numeric chat id; an @username can never match one.
    if (!NUMERIC_CHAT_ID.test(this.deps.chatId)) {
      logWarn(`Command listener disabled: TELEGRAM_CHAT_ID ${this.deps.chatId} is not a numeric chat id`);
      return this.loopDone;
    }
    this.running = true;
    this.controller = new AbortController();
    this.loopDone = this.loop();
    return this.loopDone;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return this.loopDone;
    }
    this.running = false;
    this.controller.abort();
    await this.loopDone;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    const text = message?.text?.trim() ?? '';
    if (!message || text.length === 0) {
      return;
    }

    if (String(message.chat.id) !== this.deps.chatId) {
      logWarn(`Ignoring message from unknown chat ${message.chat.id}`);
      return;
    }

    switch (parseCommand(text)) {
      case 'status': {
        const now = this.deps.now ?? nowSec;
        const report = await renderStatusReport(this.deps.fetchStatuses, now() - this.deps.statusLookbackSec);
        await this.deps.notifier.reply(report, { keyboard: STATUS_KEYBOARD });
        return;
      }
      case 'start':
      case 'help':
        await this.deps.notifier.reply(helpText(), { keyboard: STATUS_KEYBOARD });
        return;
      default:
        await this.deps.notifier.reply(promptText(), { keyboard: STATUS_KEYBOARD });
    }
  }

  private async loop(): Promise<void> {
    logInfo('Command listener started');
    if (this.deps.discardBacklogOnStart) {
      await this.bootstrapBacklog();
    }

    while (this.running) {
      let updates: TelegramUpdate[];
      try {
        updates = await this.deps.telegram.getUpdates(this.offset, this.deps.longPollTimeoutSec, this.controller.signal);
      } catch (error) {
        if (!this.running) {
          break;
        }
        logError('Command poll failed', error);
        await sleep(this.deps.errorBackoffMs, this.controller.signal);
        continue;
      }

      for (const update of updates) {
        this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
        try {
          await this.handleUpdate(update);
        } catch (error) {
          logError(`Failed to handle update ${update.update_id}`, error);
        }
      }
    }
    logInfo('Command listener stopped');
  }

  private async bootstrapBacklog(): Promise<void> {
    try {
      const updates = await this.deps.telegram.getUpdates(-1, 0, this.controller.signal);
      const last = updates.at(-1);
      if (!last) {
        return;
      }
      this.offset = last.update_id + 1;
      logInfo(`Skipped pending chat updates up to ${last.update_id}`);
    } catch (error) {
      logWarn('Startup backlog skip failed; continuing with pending updates', error);
    }
  }
}
