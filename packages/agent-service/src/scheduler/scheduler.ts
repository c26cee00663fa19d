import { describeError, systemClock } from '@stayhound/shared';
import type { Clock } from '@stayhound/shared';
import { ScheduledTask, formatCadence } from './scheduled-task.js';
import type { ScheduledTaskOptions, TaskSnapshot } from './scheduled-task.js';

export const DEFAULT_TICK_INTERVAL_MS = 30_000;
export const DEFAULT_STOP_TIMEOUT_MS = 5_000;

export interface SchedulerOptions {
  tickIntervalMs?: number;
  stopTimeoutMs?: number;
  now?: Clock;
}

export interface SchedulerStatus {
  running: boolean;
  totalTasks: number;
  enabledTasks: number;
  runningTasks: number;
  tasks: TaskSnapshot[];
}

export type TriggerResult = 'started' | 'already_running' | 'disabled' | 'not_found';

// One loop per process.
let activeScheduler: Scheduler | null = null;

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const wake = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal.addEventListener('abort', wake, { once: true });
  });
}

/** Resolves true when `promise` settles within `ms`, false otherwise. */
function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    void promise.then(done, done);
  });
}

export class Scheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly tickIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly now: Clock;
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;

  constructor(options: SchedulerOptions = {}) {
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.now = options.now ?? systemClock;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  addTask(options: ScheduledTaskOptions): ScheduledTask {
    if (this.tasks.has(options.name)) {
      throw new Error(`Task ${options.name} is already registered`);
    }
    const task = new ScheduledTask(options, this.now());
    this.tasks.set(task.name, task);
    console.log(`[scheduler] Added task ${task.name} (every ${formatCadence(task.cadence)})`);
    return task;
  }

  /** An execution already in flight is left to finish. */
  removeTask(name: string): boolean {
    const removed = this.tasks.delete(name);
    if (removed) console.log(`[scheduler] Removed task ${name}`);
    return removed;
  }

  enableTask(name: string): boolean {
    return this.setEnabled(name, true);
  }

  disableTask(name: string): boolean {
    return this.setEnabled(name, false);
  }

  getTask(name: string): ScheduledTask | undefined {
    return this.tasks.get(name);
  }

  /** Dispatch a task now, regardless of its next run. A running task is not started twice. */
  triggerTask(name: string): TriggerResult {
    const task = this.tasks.get(name);
    if (!task) return 'not_found';
    if (!task.enabled) return 'disabled';
    if (!task.tryStart(this.now(), { ignoreSchedule: true })) return 'already_running';
    this.dispatch(task);
    return 'started';
  }

  /** Dispatches every due task and returns how many were launched. Never waits on a task. */
  tick(): number {
    const now = this.now();
    let launched = 0;
    for (const task of this.tasks.values()) {
      if (!task.tryStart(now)) continue;
      this.dispatch(task);
      launched++;
    }
    return launched;
  }

  start(): boolean {
    if (this.loop) {
      console.warn('[scheduler] Already running');
      return false;
    }
    if (activeScheduler) {
      console.warn('[scheduler] Another scheduler is already running in this process, start ignored');
      return false;
    }

    activeScheduler = this;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal);
    console.log(`[scheduler] Started with ${this.tasks.size} tasks`);
    return true;
  }

  /** Stops dispatching. Tasks mid-run are not interrupted; see waitForIdle. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    this.controller = null;
    this.loop = null;
    if (activeScheduler === this) activeScheduler = null;

    if (!(await settlesWithin(loop, this.stopTimeoutMs))) {
      console.warn(`[scheduler] Loop did not exit within ${this.stopTimeoutMs}ms`);
    }
    console.log('[scheduler] Stopped');
  }

  /** Waits for in-flight executions. Resolves false if some are still running after `timeoutMs`. */
  async waitForIdle(timeoutMs: number): Promise<boolean> {
    const drained = (async () => {
      while (this.inFlight.size > 0) {
        await Promise.all(this.inFlight);
      }
    })();
    return settlesWithin(drained, timeoutMs);
  }

  getStatus(): SchedulerStatus {
    const tasks = [...this.tasks.values()].map((task) => task.snapshot());
    return {
      running: this.isRunning,
      totalTasks: tasks.length,
      enabledTasks: tasks.filter((task) => task.enabled).length,
      runningTasks: tasks.filter((task) => task.running).length,
      tasks,
    };
  }

  private setEnabled(name: string, enabled: boolean): boolean {
    const task = this.tasks.get(name);
    if (!task) return false;
    task.enabled = enabled;
    console.log(`[scheduler] ${enabled ? 'Enabled' : 'Disabled'} task ${name}`);
    return true;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        this.tick();
      } catch (err) {
        console.error('[scheduler] Tick failed:', describeError(err));
      }
      await sleep(this.tickIntervalMs, signal);
    }
  }

  private dispatch(task: ScheduledTask): void {
    const execution: Promise<void> = this.execute(task).finally(() => {
      this.inFlight.delete(execution);
    });
    this.inFlight.add(execution);
  }

  // Every error a task throws stops here.
  private async execute(task: ScheduledTask): Promise<void> {
    const startedAt = Date.now();
    console.log(`[scheduler] Running task ${task.name}`);
    try {
      await task.run();
      console.log(`[scheduler] Task ${task.name} completed in ${Date.now() - startedAt}ms`);
    } catch (err) {
      console.error(`[scheduler] Task ${task.name} failed:`, describeError(err));
    } finally {
      task.finish(this.now());
    }
  }
}
