/**
 * ConfigRenderer - builds the body of the surfraw conf file
 *
 * Pipeline: project structured options -> reject colliding settings ->
 * merge -> format one `SURFRAW_<key>=<value>` line per setting.
 * Lines are sorted by key so identical input always renders identical text.
 */

import { RESERVED_SETTINGS, type ReservedSettingsMap } from '../config/ReservedSettings.js';
import type { SettingValue } from '../models/SettingValue.js';
import type { FreeformSettings, SurfrawConfig } from '../models/SurfrawOptions.js';
import { formatValue } from '../utils/ValueFormatter.js';
import { projectSettings } from './NamespaceProjector.js';
import { compareKeys, validateNoCollisions } from './validation/CollisionValidator.js';
import type { CollisionError } from './validation/CollisionError.js';

export const SURFRAW_KEY_PREFIX = 'SURFRAW_';

export type RenderResult =
  | { ok: true; text: string }
  | { ok: false; error: CollisionError };

export function formatConfigLine(key: string, value: SettingValue): string {
  return `${SURFRAW_KEY_PREFIX}${key}=${formatValue(value)}`;
}

export function settingsToConfigLines(settings: Readonly<Record<string, SettingValue>>): string[] {
  return Object.keys(settings)
    .sort(compareKeys)
    .map(key => formatConfigLine(key, settings[key]));
}

export function renderConfig(
  settings: FreeformSettings,
  config: SurfrawConfig,
  reserved: ReservedSettingsMap = RESERVED_SETTINGS
): RenderResult {
  const projected = projectSettings(config, reserved);

  const check = validateNoCollisions(settings, reserved);
  if (!check.ok) {
    return check;
  }

  // Key sets are disjoint at this point, spread order does not matter
  const merged: Record<string, SettingValue> = { ...settings, ...projected };

  return { ok: true, text: settingsToConfigLines(merged).join('\n') };
}
