/**
 * CollisionValidator
 *
 * Rejects free-form settings whose keys are reserved for structured options.
 * Runs before any rendering; all collisions are reported at once.
 */

import { RESERVED_SETTINGS, isReservedKey, type ReservedSettingsMap } from '../../config/ReservedSettings.js';
import { CollisionError, type Collision } from './CollisionError.js';

export type CollisionCheckResult =
  | { ok: true }
  | { ok: false; error: CollisionError };

/**
 * Keys present in both the settings and the reserved table, sorted
 */
export function findCollisions(
  settings: Readonly<Record<string, unknown>>,
  reserved: ReservedSettingsMap = RESERVED_SETTINGS
): Collision[] {
  return Object.keys(settings)
    .filter(key => isReservedKey(key, reserved))
    .sort(compareKeys)
    .map(key => ({ key, replacement: reserved[key] }));
}

export function validateNoCollisions(
  settings: Readonly<Record<string, unknown>>,
  reserved: ReservedSettingsMap = RESERVED_SETTINGS
): CollisionCheckResult {
  const collisions = findCollisions(settings, reserved);
  if (collisions.length > 0) {
    return { ok: false, error: new CollisionError(collisions) };
  }
  return { ok: true };
}

/**
 * Code-unit ordering; independent of the process locale
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
