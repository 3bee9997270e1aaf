import { interpretStatus } from './homework/interpreter.js';
import { selectMostRecent } from './homework/select.js';
import { validateResponse } from './homework/validator.js';
import { logDebug, logError, logInfo } from './logger.js';
import type { Notifier } from './notifier.js';
import type { Cursor, FetchStatuses } from './types.js';
import { getErrorMessage } from './utils.js';

interface PollCycleDeps {
  fetchStatuses: FetchStatuses;
  notifier: Pick<Notifier, 'lastDeliveredVerdict' | 'notifyStatusChange' | 'notifyError' | 'clearError'>;
}

export function advanceCursor(cursor: Cursor, currentDate: Cursor | null): Cursor {
  if (currentDate === null) {
    return cursor;
  }
  return Math.max(cursor, currentDate);
}

export function formatCycleError(error: unknown): string {
  return `Program failure: ${getErrorMessage(error)}`;
}

export class PollCycle {
  constructor(private readonly deps: PollCycleDeps) {}

  /**
   * One fetch-validate-interpret-notify pass. Never rejects: failures are
   * reported through the notifier and the incoming cursor is returned.
   */
  async runOnce(cursor: Cursor): Promise<Cursor> {
    try {
      const raw = await this.deps.fetchStatuses(cursor);
      const envelope = validateResponse(raw);
      const nextCursor = advanceCursor(cursor, envelope.currentDate);

      const selected = selectMostRecent(envelope.homeworks);
      if (!selected) {
        await this.deps.notifier.clearError();
        logDebug(`No new statuses since ${cursor}`);
        return nextCursor;
      }

      const status = interpretStatus(selected.entry);
      await this.deps.notifier.clearError();

      if (this.deps.notifier.lastDeliveredVerdict(status.subjectId) === status.verdict) {
        logDebug(`Status of "${status.subjectId}" unchanged (${status.verdict})`);
        return nextCursor;
      }

      const result = await this.deps.notifier.notifyStatusChange(status);
      if (result.outcome === 'failed') {
        logInfo(`Holding cursor at ${cursor} until "${status.subjectId}" is delivered`);
        return cursor;
      }
      return nextCursor;
    } catch (error) {
      logError('Poll cycle failed', error);
      await this.deps.notifier.notifyError(formatCycleError(error));
      return cursor;
    }
  }
}
