import { Vector3Int } from "@interest-sync/protocol";

/**
 * Euclidean containment test, inclusive of the boundary.
 *
 * Each axis delta is checked against the radius first, which keeps the
 * squared sum below 2^53 for any int32 coordinates and uint16 radius.
 */
export function isWithinRadius(center: Vector3Int, radius: number, position: Vector3Int): boolean {
  const dx = position.x - center.x;
  const dy = position.y - center.y;
  const dz = position.z - center.z;
  if (Math.abs(dx) > radius || Math.abs(dy) > radius || Math.abs(dz) > radius) {
    return false;
  }
  return dx * dx + dy * dy + dz * dz <= radius * radius;
}
