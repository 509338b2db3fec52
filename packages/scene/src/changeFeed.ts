/**
 * Change feed
 *
 * Turns the Yjs events of one transaction into the engine's update batch.
 * Objects are reported by name; deleted or renamed objects are reported
 * under the name they had before the transaction, so the engine can drop
 * what it cached for them.
 */

import type * as Y from 'yjs';
import type { UpdateBatch, UpdateEntry } from '@curvelink/core';

/**
 * Object fields whose change affects the tessellated shape
 */
const GEOMETRY_FIELDS: ReadonlySet<string> = new Set(['type', 'data', 'modifiers']);

export interface NameLookup {
  /** Names as they were before the transaction, by object id */
  previous: ReadonlyMap<string, string>;
  /** Current name of an object id, if it still exists */
  current(id: string): string | undefined;
}

export function batchFromEvents(events: ReadonlyArray<Y.YEvent<Y.AbstractType<unknown>>>, names: NameLookup): UpdateBatch {
  const objects = new Map<string, boolean>();
  const curves = new Set<string>();

  const markObject = (name: string | undefined, geometry: boolean): void => {
    if (name !== undefined) {
      objects.set(name, (objects.get(name) ?? false) || geometry);
    }
  };

  for (const event of events) {
    const [section, key] = event.path;

    if (section === 'objects') {
      if (key === undefined) {
        // Records added to or removed from the objects map
        for (const [id, change] of event.changes.keys) {
          if (change.action !== 'add') {
            markObject(names.previous.get(id), true);
          }
          markObject(names.current(id), true);
        }
      } else if (typeof key === 'string') {
        // Fields of one object record
        const fields = [...event.changes.keys.keys()];
        const current = names.current(key);
        const previous = names.previous.get(key);
        if (previous !== undefined && previous !== current) {
          markObject(previous, false);
        }
        markObject(current, fields.some((field) => GEOMETRY_FIELDS.has(field)));
      }
    } else if (section === 'curves') {
      if (key === undefined) {
        for (const name of event.changes.keys.keys()) {
          curves.add(name);
        }
      } else if (typeof key === 'string') {
        curves.add(key);
      }
    }
  }

  const updates: UpdateEntry[] = [];
  for (const [name, geometry] of objects) {
    updates.push({ kind: 'object', name, geometry });
  }
  for (const name of curves) {
    updates.push({ kind: 'curve-data', name });
  }
  return { objectsUpdated: objects.size > 0, curvesUpdated: curves.size > 0, updates };
}
