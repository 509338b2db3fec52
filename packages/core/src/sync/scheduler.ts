/**
 * Debounce scheduler
 *
 * At most one pending regeneration per source name. Each new trigger
 * cancels the pending task and re-arms it with the full delay, so the
 * update only runs once the source has been quiet for that long. The delay
 * is the smallest debounce among the source's enabled targets.
 */

import type { SceneGraph, SourceObject, TimerCallback, TimerFacility } from '../host/types.js';
import { targetsFor } from '../link/registry.js';
import { clampDebounce } from '../link/schema.js';

export interface ScheduleOptions {
  /** Regenerate even if the source digest matches the last build */
  force?: boolean;
}

export interface PendingTask {
  callback: TimerCallback;
  /** Seconds the task was armed with */
  delay: number;
  force: boolean;
}

/**
 * Runs the update for a source by name once its quiet period has elapsed
 */
export type UpdateRunner = (sourceName: string, force: boolean) => void;

export class DebounceScheduler {
  private readonly tasks = new Map<string, PendingTask>();

  constructor(
    private readonly scene: SceneGraph,
    private readonly timers: TimerFacility,
    private readonly run: UpdateRunner
  ) {}

  /**
   * Arm (or re-arm) the regeneration for `source`.
   *
   * @returns the delay in seconds, or null when the source has no enabled targets
   */
  schedule(source: SourceObject, { force = false }: ScheduleOptions = {}): number | null {
    const targets = targetsFor(this.scene, source);
    if (targets.length === 0) {
      return null;
    }

    const delay = Math.min(...targets.map((target) => clampDebounce(target.link?.debounce ?? 0)));
    const name = source.name;
    const existing = this.tasks.get(name);
    if (existing) {
      this.unregister(existing);
    }

    const task: PendingTask = {
      delay,
      force: force || (existing?.force ?? false),
      callback: () => {
        try {
          this.run(name, task.force);
        } finally {
          // A newer task may have been armed while the update ran
          if (this.tasks.get(name) === task) {
            this.tasks.delete(name);
          }
        }
      },
    };
    this.tasks.set(name, task);
    this.timers.register(task.callback, delay);
    return delay;
  }

  /**
   * Cancel the pending task for a source, if any
   */
  cancel(sourceName: string): boolean {
    const task = this.tasks.get(sourceName);
    if (!task) {
      return false;
    }
    this.unregister(task);
    this.tasks.delete(sourceName);
    return true;
  }

  /**
   * Cancel every pending task
   */
  clear(): void {
    for (const task of this.tasks.values()) {
      this.unregister(task);
    }
    this.tasks.clear();
  }

  pending(sourceName: string): Readonly<PendingTask> | undefined {
    return this.tasks.get(sourceName);
  }

  get size(): number {
    return this.tasks.size;
  }

  private unregister(task: PendingTask): void {
    if (this.timers.isRegistered(task.callback)) {
      this.timers.unregister(task.callback);
    }
  }
}
