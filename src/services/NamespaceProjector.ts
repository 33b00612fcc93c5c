/**
 * NamespaceProjector
 *
 * Projects structured options onto the flat settings namespace using the
 * reserved settings table, e.g. `graphical.browser` becomes the
 * `graphical_browser` setting.
 */

import { RESERVED_SETTINGS, type ReservedSettingsMap } from '../config/ReservedSettings.js';
import { toSettingValue, type SettingValue } from '../models/SettingValue.js';
import type { SurfrawConfig } from '../models/SurfrawOptions.js';

export type ProjectedSettings = Readonly<Record<string, SettingValue>>;

/**
 * A reserved setting points at a path that does not exist in the options.
 * This is a defect in the reserved settings table, not a user error.
 */
export class ReservedPathError extends Error {
  constructor(
    public readonly key: string,
    public readonly path: string
  ) {
    super(`Reserved setting '${key}' points to unknown option path '${path}'`);
    this.name = 'ReservedPathError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Look up a dotted path in a nested record
 *
 * @returns the value, or undefined when any segment is missing
 */
export function getAtPath(source: unknown, dottedPath: string): unknown {
  let current: unknown = source;
  for (const segment of dottedPath.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function projectSettings(
  config: SurfrawConfig,
  reserved: ReservedSettingsMap = RESERVED_SETTINGS
): ProjectedSettings {
  const projected: Record<string, SettingValue> = {};

  for (const [key, dottedPath] of Object.entries(reserved)) {
    const value = getAtPath(config, dottedPath);
    if (value === undefined) {
      throw new ReservedPathError(key, dottedPath);
    }
    projected[key] = toSettingValue(key, value);
  }

  return Object.freeze(projected);
}

/**
 * Fail fast when the reserved settings table does not match the options shape
 */
export function assertReservedPathsResolve(
  config: SurfrawConfig,
  reserved: ReservedSettingsMap = RESERVED_SETTINGS
): void {
  projectSettings(config, reserved);
}
