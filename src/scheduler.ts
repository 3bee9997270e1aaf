import { logError, logInfo } from './logger.js';
import type { PollCycle } from './pollCycle.js';
import type { Cursor } from './types.js';
import { sleep } from './utils.js';

export type SchedulerState = 'idle' | 'polling' | 'stopped';

interface SchedulerDeps {
  cycle: Pick<PollCycle, 'runOnce'>;
  pollIntervalMs: number;
  initialCursor: Cursor;
}

export class SchedulerLoop {
  private running = false;
  private currentState: SchedulerState = 'stopped';
  private cursorValue: Cursor;
  private sleepController: AbortController | null = null;
  private loopDone: Promise<void> = Promise.resolve();

  constructor(private readonly deps: SchedulerDeps) {
    this.cursorValue = deps.initialCursor;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get cursor(): Cursor {
    return this.cursorValue;
  }

  /** Resolves once the loop has been stopped and the last cycle finished. */
  start(): Promise<void> {
    if (this.running) {
      return this.loopDone;
    }

    this.running = true;
    this.currentState = 'idle';
    logInfo(`Scheduler started (interval ${this.deps.pollIntervalMs}ms, cursor ${this.cursorValue})`);
    this.loopDone = this.loop();
    return this.loopDone;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return this.loopDone;
    }
    this.running = false;
    this.sleepController?.abort();
    await this.loopDone;
  }

  private async loop(): Promise<void> {
    try {
      while (this.running) {
        this.currentState = 'polling';
        try {
          const next = await this.deps.cycle.runOnce(this.cursorValue);
          this.cursorValue = Math.max(this.cursorValue, next);
        } catch (error) {
          logError('Poll cycle threw', error);
        }
        this.currentState = 'idle';

        if (!this.running) {
          break;
        }
        this.sleepController = new AbortController();
        await sleep(this.deps.pollIntervalMs, this.sleepController.signal);
        this.sleepController = null;
      }
    } finally {
      this.currentState = 'stopped';
      logInfo('Scheduler stopped');
    }
  }
}
