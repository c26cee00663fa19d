import { DAY_MS, HOUR_MS, MINUTE_MS } from '@stayhound/shared';

export type CadenceUnit = 'minutes' | 'hours' | 'days';

export interface Cadence {
  value: number;
  unit: CadenceUnit;
}

export type TaskFunction = () => Promise<void> | void;

export interface ScheduledTaskOptions {
  name: string;
  cadence: Cadence;
  run: TaskFunction;
  enabled?: boolean;
}

export interface TaskSnapshot {
  name: string;
  cadence: string;
  enabled: boolean;
  running: boolean;
  lastRun: Date | null;
  nextRun: Date;
}

const UNIT_MS: Record<CadenceUnit, number> = {
  minutes: MINUTE_MS,
  hours: HOUR_MS,
  days: DAY_MS,
};

export function cadenceToMs(cadence: Cadence): number {
  return cadence.value * UNIT_MS[cadence.unit];
}

export function formatCadence(cadence: Cadence): string {
  return `${cadence.value} ${cadence.unit}`;
}

export class ScheduledTask {
  readonly name: string;
  readonly cadence: Cadence;
  readonly run: TaskFunction;
  enabled: boolean;
  private runningFlag = false;
  private lastRunAt: Date | null = null;
  private nextRunAt: Date;

  /** A new task is due at `createdAt`, so the first tick after registration runs it. */
  constructor(options: ScheduledTaskOptions, createdAt: Date) {
    if (!Number.isFinite(options.cadence.value) || options.cadence.value <= 0) {
      throw new RangeError(`Task ${options.name}: cadence must be positive, got ${options.cadence.value}`);
    }
    this.name = options.name;
    this.cadence = options.cadence;
    this.run = options.run;
    this.enabled = options.enabled ?? true;
    this.nextRunAt = createdAt;
  }

  get running(): boolean {
    return this.runningFlag;
  }

  get lastRun(): Date | null {
    return this.lastRunAt;
  }

  get nextRun(): Date {
    return this.nextRunAt;
  }

  isDue(now: Date): boolean {
    return this.enabled && !this.runningFlag && this.nextRunAt.getTime() <= now.getTime();
  }

  /**
   * Check-and-set of the running flag. Only the scheduler's own tick calls this,
   * so no two dispatches can both see the task idle.
   */
  tryStart(now: Date, options: { ignoreSchedule?: boolean } = {}): boolean {
    const eligible = options.ignoreSchedule
      ? this.enabled && !this.runningFlag
      : this.isDue(now);
    if (!eligible) return false;

    this.runningFlag = true;
    this.lastRunAt = now;
    return true;
  }

  /** Next run counts from completion, so a slow run pushes its own schedule back. */
  finish(now: Date): void {
    this.runningFlag = false;
    this.nextRunAt = new Date(now.getTime() + cadenceToMs(this.cadence));
  }

  snapshot(): TaskSnapshot {
    return {
      name: this.name,
      cadence: formatCadence(this.cadence),
      enabled: this.enabled,
      running: this.runningFlag,
      lastRun: this.lastRunAt,
      nextRun: this.nextRunAt,
    };
  }
}
