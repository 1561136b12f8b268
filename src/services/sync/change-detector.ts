/**
 * Change Detector - decide insert / update / no-op per canonical event
 */

import { computeFingerprint } from "./fingerprint.js";

import type { ChangeSet, DisasterEvent } from "../../types/index.js";

/**
 * Compare canonical events against the persisted fingerprints
 * (sourceId → fingerprint) read at the start of the cycle.
 */
export function diff(
  events: DisasterEvent[],
  persistedIndex: ReadonlyMap<string, string>
): ChangeSet {
  const changes: ChangeSet = { toInsert: [], toUpdate: [], unchanged: [] };

  for (const event of events) {
    const fingerprint = computeFingerprint(event);
    const stored = persistedIndex.get(event.sourceId);
    const planned = { event, fingerprint };

    if (stored === undefined) {
      changes.toInsert.push(planned);
    } else if (stored !== fingerprint) {
      changes.toUpdate.push(planned);
    } else {
      changes.unchanged.push(planned);
    }
  }

  return changes;
}
