/**
 * Event fingerprints for change detection.
 *
 * The fingerprint covers every mutable field except fetchedAt, serialized
 * with sorted keys so that attribute order never produces a spurious update.
 */

import { createHash } from "node:crypto";

import type { DisasterEvent } from "../../types/index.js";

/**
 * JSON serialization with object keys sorted recursively
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        out[key] = normalize(entry);
      }
    }
    return out;
  }
  return value;
}

export function computeFingerprint(event: DisasterEvent): string {
  const payload = stableStringify({
    eventType: event.eventType,
    severity: event.severity,
    geometry: event.geometry,
    occurredAt: event.occurredAt,
    rawAttributes: event.rawAttributes,
  });

  return createHash("sha256").update(payload).digest("hex");
}
