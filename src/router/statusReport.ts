import { isHomeworkWatchError } from '../errors.js';
import { interpretStatus } from '../homework/interpreter.js';
import { selectMostRecent } from '../homework/select.js';
import { validateResponse } from '../homework/validator.js';
import { VERDICT_TEXT } from '../homework/verdicts.js';
import { logWarn } from '../logger.js';
import type { Cursor, FetchStatuses } from '../types.js';
import { getErrorMessage } from '../utils.js';

export const NO_DATA_TEXT = 'No homework data received yet. Try again later.';

/**
 * On-demand report for the interactive channel. Reads the API independently
 * of the scheduler's cursor and never throws: failures become the reply text.
 */
export async function renderStatusReport(fetchStatuses: FetchStatuses, fromDate: Cursor): Promise<string> {
  try {
    const envelope = validateResponse(await fetchStatuses(fromDate));
    const selected = selectMostRecent(envelope.homeworks);
    if (!selected) {
      return NO_DATA_TEXT;
    }

    const status = interpretStatus(selected.entry);
    return [
      `Homework: ${status.subjectId}`,
      `Status: ${VERDICT_TEXT[status.verdict]}`,
      `Last update: ${formatEpochSec(status.lastUpdate)}`,
    ].join('\n');
  } catch (error) {
    logWarn('On-demand status check failed', error);
    if (isHomeworkWatchError(error)) {
      return `Failed to fetch status: ${error.message}`;
    }
    return `Unexpected error: ${getErrorMessage(error)}`;
  }
}

export function formatEpochSec(value: number | null): string {
  if (value === null) {
    return 'unknown';
  }
  return new Date(value * 1000).toISOString().replace('.000Z', 'Z');
}
