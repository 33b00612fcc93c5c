/**
 * Reserved surfraw settings
 *
 * Settings keys that are derived from the structured options and must not
 * appear in the free-form settings. Each key maps to the option path that
 * replaces it.
 */

import type { SurfrawConfigPath } from '../models/SurfrawOptions.js';

export const RESERVED_SETTINGS = {
  graphical: 'useGraphicalBrowser',
  graphical_browser: 'graphical.browser',
  graphical_browser_args: 'graphical.browserArgs',
  text_browser: 'textual.browser',
  text_browser_args: 'textual.browserArgs',
} as const satisfies Record<string, SurfrawConfigPath>;

/**
 * Settings key -> dotted option path. Paths are only checked at run time
 * here; RESERVED_SETTINGS itself is checked against SurfrawConfig above.
 */
export type ReservedSettingsMap = Readonly<Record<string, string>>;

export type ReservedKey = keyof typeof RESERVED_SETTINGS;

export function isReservedKey(
  key: string,
  reserved: ReservedSettingsMap = RESERVED_SETTINGS
): boolean {
  return Object.prototype.hasOwnProperty.call(reserved, key);
}
