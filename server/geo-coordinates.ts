import type { CoordinateCoverage, GeoLocated, WithCoordinates } from "@shared/schema";

const JITTER_BUCKETS = 10_000;
const JITTER_SPAN_DEGREES = 0.00005;

/**
 * (0, 0) is what the ERP stores for "never set", so it counts as missing.
 */
export function isValidCoordinate(latitude: number | null | undefined, longitude: number | null | undefined): boolean {
  if (typeof latitude !== "number" || typeof longitude !== "number") {
    return false;
  }
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return false;
  }
  return !(latitude === 0 && longitude === 0);
}

export function hasValidCoordinates<T extends GeoLocated>(item: T): item is WithCoordinates<T> {
  return isValidCoordinate(item.latitude, item.longitude);
}

export function withValidCoordinates<T extends GeoLocated>(items: readonly T[]): WithCoordinates<T>[] {
  return items.filter((item): item is WithCoordinates<T> => hasValidCoordinates(item));
}

export function coordinateCoverage(items: readonly GeoLocated[]): CoordinateCoverage {
  let withCoordinates = 0;
  for (const item of items) {
    if (isValidCoordinate(item.latitude, item.longitude)) {
      withCoordinates += 1;
    }
  }
  return { total: items.length, withCoordinates };
}

// FNV-1a, 32 bit
function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < seed.length; index += 1) {
    hash ^= seed.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Small stable offset (within ±0.000025°) that separates points sharing a location.
 */
export function jitterOffset(seed: string): number {
  const bucket = hashSeed(seed) % JITTER_BUCKETS;
  return (bucket / JITTER_BUCKETS - 0.5) * JITTER_SPAN_DEGREES;
}
