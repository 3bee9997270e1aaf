import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiError, DeliveryError } from '../src/errors.js';
import { STATUS_KEYBOARD, helpText, promptText } from '../src/router/commands.js';
import { CommandListener } from '../src/router/listener.js';
import { NO_DATA_TEXT, formatEpochSec, renderStatusReport } from '../src/router/statusReport.js';
import type { DeliveryOptions, TelegramUpdate } from '../src/types.js';

function message(updateId: number, text: string, chatId = 42): TelegramUpdate {
  return { update_id: updateId, message: { message_id: updateId, chat: { id: chatId }, text } };
}

function createListener(response: () => Promise<unknown>) {
  const deps = {
    telegram: {
      getUpdates: vi.fn(async (_offset: number | null, _timeoutSec: number, _signal?: AbortSignal): Promise<TelegramUpdate[]> => []),
    },
    notifier: {
      reply: vi.fn(async (_text: string, _options?: DeliveryOptions) => ({ outcome: 'suppressed' as const })),
    },
    fetchStatuses: vi.fn(async (_fromDate: number) => response()),
    chatId: '42',
    longPollTimeoutSec: 30,
    errorBackoffMs: 0,
    statusLookbackSec: 3600,
    discardBacklogOnStart: true,
    now: () => 10_000,
  };
  return { listener: new CommandListener(deps), deps };
}

describe('CommandListener.handleUpdate', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers /status with the latest homework over the lookback window', async () => {
    const { listener, deps } = createListener(async () => ({
      homeworks: [
        { homework_name: 'hw_old', status: 'rejected', date_updated: 50 },
        { homework_name: 'hw_new', status: 'approved', date_updated: 100 },
      ],
    }));

    await listener.handleUpdate(message(1, '/status'));

    expect(deps.fetchStatuses).toHaveBeenCalledWith(6400);
    expect(deps.notifier.reply).toHaveBeenCalledWith(
      'Homework: hw_new\nStatus: The work has been reviewed: the reviewer liked everything. Hooray!\nLast update: 1970-01-01T00:01:40Z',
      { keyboard: STATUS_KEYBOARD },
    );
  });

  it('treats the keyboard button like /status', async () => {
    const { listener, deps } = createListener(async () => ({ homeworks: [] }));

    await listener.handleUpdate(message(1, 'Check homework status'));

    expect(deps.notifier.reply).toHaveBeenCalledWith(NO_DATA_TEXT, { keyboard: STATUS_KEYBOARD });
  });

  it('replies with help and prompts with the keyboard', async () => {
    const { listener, deps } = createListener(async () => ({ homeworks: [] }));

    await listener.handleUpdate(message(1, '/help'));
    await listener.handleUpdate(message(2, 'hi there'));

    expect(deps.notifier.reply).toHaveBeenNthCalledWith(1, helpText(), { keyboard: STATUS_KEYBOARD });
    expect(deps.notifier.reply).toHaveBeenNthCalledWith(2, promptText(), { keyboard: STATUS_KEYBOARD });
    expect(deps.fetchStatuses).not.toHaveBeenCalled();
  });

  it('ignores other chats and non-text updates', async () => {
    const { listener, deps } = createListener(async () => ({ homeworks: [] }));

    await listener.handleUpdate(message(1, '/status', 7));
    await listener.handleUpdate({ update_id: 2 });
    await listener.handleUpdate(message(3, '   '));

    expect(deps.notifier.reply).not.toHaveBeenCalled();
    expect(deps.fetchStatuses).not.toHaveBeenCalled();
  });
});

describe('CommandListener loop', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('skips the backlog, advances the offset and stops on abort', async () => {
    const { listener, deps } = createListener(async () => ({ homeworks: [] }));
    const batches: TelegramUpdate[][] = [[{ update_id: 7 }], [message(8, '/help')]];
    deps.telegram.getUpdates.mockImplementation(async (_offset, _timeoutSec, signal) => {
      const next = batches.shift();
      if (next) {
        return next;
      }
      return new Promise<TelegramUpdate[]>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new DeliveryError('Telegram getUpdates aborted')));
      });
    });

    const done = listener.start();
    await vi.waitFor(() => expect(deps.telegram.getUpdates).toHaveBeenCalledTimes(3));
    await listener.stop();
    await done;

    const calls = deps.telegram.getUpdates.mock.calls.map(([offset, timeoutSec]) => [offset, timeoutSec]);
    expect(calls).toEqual([
      [-1, 0],
      [8, 30],
      [9, 30],
    ]);
    expect(deps.notifier.reply).toHaveBeenCalledWith(helpText(), { keyboard: STATUS_KEYBOARD });
  });

  it('does not poll when the chat is configured by @username', async () => {
    const { deps } = createListener(async () => ({ homeworks: [] }));
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const listener = new CommandListener({ ...deps, chatId: '@mychannel' });

    await listener.start();
    await listener.stop();

    expect(deps.telegram.getUpdates).not.toHaveBeenCalled();
    expect(String(warnSpy.mock.calls[0]?.[0])).toMatch(
      /WARN Command listener disabled: TELEGRAM_CHAT_ID @mychannel is not a numeric chat id$/,
    );
  });

  it('keeps polling after a failed getUpdates', async () => {
    const { listener, deps } = createListener(async () => ({ homeworks: [] }));
    let calls = 0;
    deps.telegram.getUpdates.mockImplementation(async (_offset, _timeoutSec, signal) => {
      calls += 1;
      if (calls === 2) {
        throw new DeliveryError('Telegram getUpdates failed: 502 Bad Gateway');
      }
      if (calls < 4) {
        return [];
      }
      return new Promise<TelegramUpdate[]>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new DeliveryError('Telegram getUpdates aborted')));
      });
    });

    const done = listener.start();
    await vi.waitFor(() => expect(deps.telegram.getUpdates).toHaveBeenCalledTimes(4));
    await listener.stop();
    await done;

    expect(calls).toBe(4);
  });
});

describe('renderStatusReport', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('explains known failures', async () => {
    const failing = async (): Promise<unknown> => {
      throw new ApiError('Practicum API responded 500: oops (from_date=1)', 500);
    };

    await expect(renderStatusReport(failing, 1)).resolves.toBe(
      'Failed to fetch status: Practicum API responded 500: oops (from_date=1)',
    );
  });

  it('reports unexpected failures separately', async () => {
    const failing = async (): Promise<unknown> => {
      throw new RangeError('kaboom');
    };

    await expect(renderStatusReport(failing, 1)).resolves.toBe('Unexpected error: kaboom');
  });

  it('prints an unknown update time when the entry has none', async () => {
    const report = await renderStatusReport(async () => ({ homeworks: [{ homework_name: 'hw1', status: 'reviewing' }] }), 1);

    expect(report.split('\n')).toEqual([
      'Homework: hw1',
      'Status: The work has been taken for review by a reviewer.',
      'Last update: unknown',
    ]);
  });

  it('reports an out-of-range update time as unknown', async () => {
    const report = await renderStatusReport(
      async () => ({ homeworks: [{ homework_name: 'hw1', status: 'approved', date_updated: 1e16 }] }),
      1,
    );

    expect(report.split('\n')[2]).toBe('Last update: unknown');
  });
});

describe('formatEpochSec', () => {
  it('renders seconds as a UTC timestamp', () => {
    expect(formatEpochSec(1700000000)).toBe('2023-11-14T22:13:20Z');
    expect(formatEpochSec(null)).toBe('unknown');
  });
});
