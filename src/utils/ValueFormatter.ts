/**
 * ValueFormatter
 *
 * Convert setting values into the value grammar of the surfraw conf file:
 * - booleans become yes / no
 * - string lists are space-joined and double-quoted, or `none` when every
 *   element is empty
 * - strings and integers are written unquoted
 */

import type { SettingValue } from '../models/SettingValue.js';

export const NONE_VALUE = 'none';

/**
 * A list renders as `none` when it has no element with text in it.
 * [] and [""] are the same value to surfraw.
 */
export function isEffectivelyEmpty(list: readonly string[]): boolean {
  return list.every(item => item === '');
}

export function formatValue(setting: SettingValue): string {
  switch (setting.kind) {
    case 'boolean':
      return setting.value ? 'yes' : 'no';
    case 'stringList':
      return isEffectivelyEmpty(setting.value)
        ? NONE_VALUE
        : `"${setting.value.join(' ')}"`;
    case 'text':
      return setting.value;
    case 'integer':
      return String(setting.value);
    default: {
      const unreachable: never = setting;
      return unreachable;
    }
  }
}
