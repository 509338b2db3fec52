/**
 * Timer facility backed by the Node.js event loop
 */

import type { TimerCallback, TimerFacility } from '../host/types.js';

export interface NodeTimerFacility extends TimerFacility {
  /** Number of callbacks currently registered */
  readonly size: number;
  /** Unregister everything */
  clear(): void;
}

/**
 * One-shot timers keyed by callback. Registering a callback that is already
 * registered re-arms it.
 */
export function createNodeTimers(): NodeTimerFacility {
  const handles = new Map<TimerCallback, ReturnType<typeof setTimeout>>();

  const unregister = (callback: TimerCallback): void => {
    const handle = handles.get(callback);
    if (handle !== undefined) {
      clearTimeout(handle);
      handles.delete(callback);
    }
  };

  return {
    register(callback, delaySeconds) {
      unregister(callback);
      const handle = setTimeout(() => {
        handles.delete(callback);
        callback();
      }, Math.max(0, delaySeconds) * 1000);
      handles.set(callback, handle);
    },
    unregister,
    isRegistered(callback) {
      return handles.has(callback);
    },
    get size() {
      return handles.size;
    },
    clear() {
      for (const handle of handles.values()) {
        clearTimeout(handle);
      }
      handles.clear();
    },
  };
}
