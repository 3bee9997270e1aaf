import { readLastUpdate } from './interpreter.js';

/** Wrapper so a `null` entry is not confused with an empty batch. */
export interface SelectedHomework {
  entry: unknown;
}

/**
 * Picks the entry with the latest `date_updated`. Entries without one sort as
 * 0; on a tie the entry that came first in the response wins.
 */
export function selectMostRecent(homeworks: readonly unknown[]): SelectedHomework | null {
  let best: { entry: unknown; ts: number } | null = null;
  for (const entry of homeworks) {
    const ts = readLastUpdate(entry) ?? 0;
    if (!best || ts > best.ts) {
      best = { entry, ts };
    }
  }
  return best ? { entry: best.entry } : null;
}
