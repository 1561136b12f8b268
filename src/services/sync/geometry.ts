/**
 * Geometry validation applied before anything is written.
 *
 * Mirrors what PostGIS would reject (`ST_IsValid`, or a degenerate shape) so a
 * bad record can be excluded without partial-transaction rollback.
 */

import type { EventGeometry, Position } from "../../types/index.js";

function positionIssue(position: Position): string | null {
  const [lon, lat] = position;
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) {
    return "non-finite coordinate";
  }
  if (lon < -180 || lon > 180) {
    return `longitude ${String(lon)} out of range`;
  }
  if (lat < -90 || lat > 90) {
    return `latitude ${String(lat)} out of range`;
  }
  return null;
}

function samePosition(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Shoelace formula over a closed ring, in squared degrees
 */
export function ringArea(ring: Position[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const current = ring[i];
    const next = ring[i + 1];
    if (current === undefined || next === undefined) {
      continue;
    }
    sum += current[0] * next[1] - next[0] * current[1];
  }
  return Math.abs(sum) / 2;
}

// ============================================================================
// Planar predicates
// ============================================================================

type Segment = [Position, Position];

/**
 * Turn direction of a -> b -> c: 1 left, -1 right, 0 collinear
 */
function orientation(a: Position, b: Position, c: Position): number {
  return Math.sign(
    (b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0])
  );
}

// c within the bounding box of ab; only meaningful when the three are collinear
function withinBounds(a: Position, b: Position, c: Position): boolean {
  return (
    Math.min(a[0], b[0]) <= c[0] &&
    c[0] <= Math.max(a[0], b[0]) &&
    Math.min(a[1], b[1]) <= c[1] &&
    c[1] <= Math.max(a[1], b[1])
  );
}

/**
 * Interiors cross at a single point
 */
function segmentsCross([a, b]: Segment, [c, d]: Segment): boolean {
  return (
    orientation(a, b, c) * orientation(a, b, d) < 0 &&
    orientation(c, d, a) * orientation(c, d, b) < 0
  );
}

/**
 * Share at least one point, endpoints included
 */
function segmentsTouch(first: Segment, second: Segment): boolean {
  if (segmentsCross(first, second)) {
    return true;
  }
  const [a, b] = first;
  const [c, d] = second;
  return (
    (orientation(a, b, c) === 0 && withinBounds(a, b, c)) ||
    (orientation(a, b, d) === 0 && withinBounds(a, b, d)) ||
    (orientation(c, d, a) === 0 && withinBounds(c, d, a)) ||
    (orientation(c, d, b) === 0 && withinBounds(c, d, b))
  );
}

/**
 * Edges of a closed ring, zero-length edges from repeated positions removed
 */
function edgesOf(ring: Position[]): Segment[] {
  const edges: Segment[] = [];
  for (let i = 0; i < ring.length - 1; i++) {
    const start = ring[i];
    const end = ring[i + 1];
    if (start === undefined || end === undefined || samePosition(start, end)) {
      continue;
    }
    edges.push([start, end]);
  }
  return edges;
}

// `second` starts where `first` ends and doubles back along it
function doublesBack([p, q]: Segment, [, r]: Segment): boolean {
  const dot = (q[0] - p[0]) * (r[0] - q[0]) + (q[1] - p[1]) * (r[1] - q[1]);
  return orientation(p, q, r) === 0 && dot < 0;
}

/**
 * A ring is simple when only consecutive edges meet, and only at their
 * shared vertex
 */
function ringSelfIntersects(ring: Position[]): boolean {
  const edges = edgesOf(ring);
  const last = edges.length - 1;

  for (const [i, first] of edges.entries()) {
    for (const [j, second] of edges.entries()) {
      if (j <= i) {
        continue;
      }
      if (j === i + 1) {
        if (doublesBack(first, second)) {
          return true;
        }
      } else if (i === 0 && j === last) {
        if (doublesBack(second, first)) {
          return true;
        }
      } else if (segmentsTouch(first, second)) {
        return true;
      }
    }
  }
  return false;
}

function onBoundary(position: Position, ring: Position[]): boolean {
  return edgesOf(ring).some(
    ([a, b]) => orientation(a, b, position) === 0 && withinBounds(a, b, position)
  );
}

/**
 * Even-odd test; callers exclude boundary positions first
 */
function pointInRing(position: Position, ring: Position[]): boolean {
  const [x, y] = position;
  let inside = false;
  for (const [a, b] of edgesOf(ring)) {
    if (a[1] > y !== b[1] > y) {
      const crossingX = a[0] + ((y - a[1]) * (b[0] - a[0])) / (b[1] - a[1]);
      if (x < crossingX) {
        inside = !inside;
      }
    }
  }
  return inside;
}

function ringsCross(first: Position[], second: Position[]): boolean {
  const secondEdges = edgesOf(second);
  return edgesOf(first).some((edge) =>
    secondEdges.some((other) => segmentsCross(edge, other))
  );
}

/**
 * `inner` lies inside `outer`, touching its boundary at most at vertices.
 * A ring running entirely along the other's boundary counts as inside.
 */
function ringWithin(inner: Position[], outer: Position[]): boolean {
  if (ringsCross(inner, outer)) {
    return false;
  }
  const vertex = inner.find((position) => !onBoundary(position, outer));
  return vertex === undefined || pointInRing(vertex, outer);
}

// ============================================================================
// Validation
// ============================================================================

function ringIssue(ring: Position[], label: string): string | null {
  for (const position of ring) {
    const issue = positionIssue(position);
    if (issue !== null) {
      return `${label}: ${issue}`;
    }
  }

  const first = ring[0];
  const last = ring[ring.length - 1];
  if (ring.length < 4 || first === undefined || last === undefined) {
    return `${label} has fewer than 4 positions`;
  }
  if (!samePosition(first, last)) {
    return `${label} is not closed`;
  }

  const distinct = new Set(ring.map(([lon, lat]) => `${String(lon)},${String(lat)}`));
  if (distinct.size < 3) {
    return `${label} has fewer than 3 distinct positions`;
  }
  if (ringArea(ring) === 0) {
    return `${label} has zero area`;
  }
  if (ringSelfIntersects(ring)) {
    return `${label} crosses itself`;
  }
  return null;
}

/**
 * Return the first reason the geometry cannot be persisted, or null when valid
 */
export function findGeometryIssue(geometry: EventGeometry): string | null {
  if (geometry.type === "Point") {
    return positionIssue(geometry.coordinates);
  }

  if (geometry.coordinates.length === 0) {
    return "polygon has no rings";
  }
  for (const [index, ring] of geometry.coordinates.entries()) {
    const issue = ringIssue(ring, index === 0 ? "exterior ring" : `hole ${String(index)}`);
    if (issue !== null) {
      return issue;
    }
  }

  const [shell = [], ...holes] = geometry.coordinates;
  for (const [index, hole] of holes.entries()) {
    const label = `hole ${String(index + 1)}`;
    // a hole sharing every position with the shell leaves no interior
    if (
      !ringWithin(hole, shell) ||
      hole.every((position) => onBoundary(position, shell))
    ) {
      return `${label} lies outside the exterior ring`;
    }
    for (const [otherIndex, other] of holes.slice(0, index).entries()) {
      if (
        ringsCross(hole, other) ||
        ringWithin(hole, other) ||
        ringWithin(other, hole)
      ) {
        return `${label} overlaps hole ${String(otherIndex + 1)}`;
      }
    }
  }
  return null;
}
