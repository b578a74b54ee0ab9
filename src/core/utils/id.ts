/**
 * Monotonic identifiers for GPU objects whose identity (not contents)
 * decides whether a bind group must be rebuilt.
 */

let nextId = 1;

export function nextResourceId(): number {
  return nextId++;
}
