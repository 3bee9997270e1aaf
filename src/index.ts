import { loadConfig, loadEnvFile, type AppConfig } from './config.js';
import { MissingConfigError } from './errors.js';
import { logError, logInfo, setLogLevel } from './logger.js';
import { Notifier } from './notifier.js';
import { PollCycle } from './pollCycle.js';
import { PracticumClient } from './practicum/client.js';
import { CommandListener } from './router/listener.js';
import { SchedulerLoop } from './scheduler.js';
import { TelegramClient } from './telegram/client.js';
import { createTelegramTransport } from './telegram/transport.js';
import { nowSec } from './utils.js';

function readConfigOrExit(): AppConfig {
  try {
    loadEnvFile();
    return loadConfig();
  } catch (error) {
    if (error instanceof MissingConfigError) {
      logError(`Cannot start: missing required environment variables: ${error.missing.join(', ')}`);
    } else {
      logError('Invalid configuration', error);
    }
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = readConfigOrExit();
  setLogLevel(config.logLevel);

  const practicum = new PracticumClient({
    apiBase: config.practicum.apiBase,
    token: config.practicum.token,
    requestTimeoutMs: config.httpTimeoutMs,
  });

  const telegram = new TelegramClient({
    apiBase: config.telegram.apiBase,
    token: config.telegram.token,
    requestTimeoutMs: config.httpTimeoutMs,
  });

  const fetchStatuses = (fromDate: number): Promise<unknown> => practicum.getStatuses(fromDate);
  const notifier = new Notifier(createTelegramTransport(telegram, config.telegram.chatId));

  const scheduler = new SchedulerLoop({
    cycle: new PollCycle({ fetchStatuses, notifier }),
    pollIntervalMs: config.pollIntervalMs,
    initialCursor: nowSec(),
  });

  const listener = config.commands.enabled
    ? new CommandListener({
        telegram,
        notifier,
        fetchStatuses,
        chatId: config.telegram.chatId,
        longPollTimeoutSec: config.commands.longPollTimeoutSec,
        errorBackoffMs: config.commands.errorBackoffMs,
        statusLookbackSec: config.commands.statusLookbackSec,
        discardBacklogOnStart: config.commands.discardBacklogOnStart,
      })
    : null;

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo(`Received ${signal}, shutting down...`);

    try {
      await Promise.all([scheduler.stop(), listener?.stop()]);
    } catch (error) {
      logError('Shutdown error', error);
      process.exitCode = 1;
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logInfo('Starting homework status notifier');
  logInfo(`Destination chat: ${config.telegram.chatId}`);
  logInfo(`Poll interval: ${config.pollIntervalMs}ms`);
  logInfo(`Interactive commands: ${config.commands.enabled}`);

  await Promise.all([scheduler.start(), listener?.start()]);
  logInfo('Homework status notifier exited');
}

void main().catch((error) => {
  logError('Fatal startup error', error);
  process.exit(1);
});
