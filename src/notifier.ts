import { logDebug, logError, logInfo, logWarn } from './logger.js';
import type { Verdict } from './homework/verdicts.js';
import type { DeliveryOptions, DeliveryTransport, InterpretedStatus, MessageHandle } from './types.js';
import { getErrorMessage, truncate } from './utils.js';

export type DeliveryResult =
  | { outcome: 'sent'; handle: MessageHandle }
  | { outcome: 'edited'; handle: MessageHandle }
  | { outcome: 'suppressed' }
  | { outcome: 'failed'; error: string };

interface DeliveredStatus {
  verdict: Verdict;
  text: string;
}

/**
 * Owns every piece of notification state. The scheduler and the command
 * listener share one instance; each public operation runs inside the same
 * promise-chain lock so a read-then-update never interleaves with another.
 */
export class Notifier {
  private readonly delivered = new Map<string, DeliveredStatus>();
  private lastErrorText: string | null = null;
  private lastErrorHandle: MessageHandle | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly transport: DeliveryTransport) {}

  lastDeliveredVerdict(subjectId: string): Verdict | null {
    return this.delivered.get(subjectId)?.verdict ?? null;
  }

  async notifyStatusChange(status: Pick<InterpretedStatus, 'subjectId' | 'verdict' | 'text'>): Promise<DeliveryResult> {
    return this.exclusive(async () => {
      const previous = this.delivered.get(status.subjectId);
      if (previous?.text === status.text) {
        logDebug(`Status notification suppressed as duplicate for "${status.subjectId}"`);
        return { outcome: 'suppressed' };
      }

      const result = await this.send(status.text);
      if (result.outcome === 'sent') {
        this.delivered.set(status.subjectId, { verdict: status.verdict, text: status.text });
      }
      return result;
    });
  }

  /**
   * Error messages are edited in place: the first error of an incident is
   * sent, later different errors rewrite that message.
   */
  async notifyError(text: string): Promise<DeliveryResult> {
    return this.exclusive(async () => {
      if (text === this.lastErrorText) {
        logDebug('Error notification suppressed as duplicate');
        return { outcome: 'suppressed' };
      }

      const handle = this.lastErrorHandle;
      if (handle && this.transport.edit) {
        try {
          await this.transport.edit(handle, text);
          this.lastErrorText = text;
          logInfo(`Edited error message ${handle.messageId}: ${truncate(text, 200)}`);
          return { outcome: 'edited', handle };
        } catch (error) {
          logWarn('Failed to edit error message; sending a new one', error);
        }
      }

      const result = await this.send(text);
      if (result.outcome === 'sent') {
        this.lastErrorText = text;
        this.lastErrorHandle = result.handle;
      }
      return result;
    });
  }

  async clearError(): Promise<void> {
    await this.exclusive(async () => {
      if (this.lastErrorText !== null) {
        logInfo('Polling recovered; error notification state cleared');
      }
      this.lastErrorText = null;
      this.lastErrorHandle = null;
    });
  }

  async reply(text: string, options?: DeliveryOptions): Promise<DeliveryResult> {
    return this.exclusive(() => this.send(text, options));
  }

  private async send(text: string, options?: DeliveryOptions): Promise<DeliveryResult> {
    try {
      const handle = await this.transport.deliver(text, options);
      logInfo(`Sent message: ${truncate(text, 200)}`);
      return { outcome: 'sent', handle };
    } catch (error) {
      logError(`Failed to send message: ${truncate(text, 200)}`, error);
      return { outcome: 'failed', error: getErrorMessage(error) };
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
