/**
 * SettingValue - typed value of a single surfraw setting
 *
 * Raw option values (JSON booleans, numbers, strings and string arrays)
 * are converted into this closed union at the ingestion boundary, so the
 * formatter never has to sniff types at render time.
 */

export type SettingValue =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'stringList'; value: readonly string[] };

export type SettingKind = SettingValue['kind'];

/**
 * Values accepted from option documents before conversion
 */
export type RawSettingValue = boolean | number | string | readonly string[];

/**
 * Thrown when a raw value falls outside the supported value domain
 */
export class InvalidSettingValueError extends Error {
  constructor(
    public readonly key: string,
    public readonly value: unknown
  ) {
    super(`Unsupported value for surfraw setting '${key}': ${JSON.stringify(value)}`);
    this.name = 'InvalidSettingValueError';
  }
}

export const booleanValue = (value: boolean): SettingValue => ({ kind: 'boolean', value });
export const integerValue = (value: number): SettingValue => ({ kind: 'integer', value });
export const textValue = (value: string): SettingValue => ({ kind: 'text', value });
export const stringListValue = (value: readonly string[]): SettingValue => ({
  kind: 'stringList',
  value: Object.freeze([...value]),
});

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Convert a raw value into a SettingValue
 *
 * @param key - Setting name, used in the error message only
 * @throws InvalidSettingValueError for non-integer numbers, lists with
 *   non-string items, and anything else outside the value domain
 */
export function toSettingValue(key: string, raw: unknown): SettingValue {
  if (typeof raw === 'boolean') {
    return booleanValue(raw);
  }
  if (typeof raw === 'number') {
    if (!Number.isSafeInteger(raw)) {
      throw new InvalidSettingValueError(key, raw);
    }
    return integerValue(raw);
  }
  if (typeof raw === 'string') {
    return textValue(raw);
  }
  if (isStringList(raw)) {
    return stringListValue(raw);
  }
  throw new InvalidSettingValueError(key, raw);
}
