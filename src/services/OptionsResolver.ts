/**
 * OptionsResolver - turn a raw options document into resolved options
 *
 * Validates the document against the options schema, merges structured
 * overrides onto the defaults and converts settings into typed values.
 */

import type { SettingValue } from '../models/SettingValue.js';
import { toSettingValue } from '../models/SettingValue.js';
import type {
  BrowserConfig,
  ResolvedOptions,
  SurfrawConfig,
  SurfrawOptionsDocument,
} from '../models/SurfrawOptions.js';
import { BrowserLocator } from '../utils/BrowserLocator.js';
import { validateOptionsDocument } from '../utils/SchemaValidator.js';

/** Browser arguments used when none are configured; renders as `none` */
export const DEFAULT_BROWSER_ARGS: readonly string[] = Object.freeze(['']);

export function createDefaultConfig(locator: BrowserLocator = new BrowserLocator()): SurfrawConfig {
  return {
    useGraphicalBrowser: true,
    graphical: {
      browser: locator.defaultGraphicalBrowser(),
      browserArgs: DEFAULT_BROWSER_ARGS,
    },
    textual: {
      browser: locator.defaultTextBrowser(),
      browserArgs: DEFAULT_BROWSER_ARGS,
    },
  };
}

function mergeBrowser(defaults: BrowserConfig, overrides?: Partial<BrowserConfig>): BrowserConfig {
  return Object.freeze({
    browser: overrides?.browser ?? defaults.browser,
    browserArgs: Object.freeze([...(overrides?.browserArgs ?? defaults.browserArgs)]),
  });
}

export function resolveConfig(
  overrides: SurfrawOptionsDocument['config'],
  defaults: SurfrawConfig
): SurfrawConfig {
  return Object.freeze({
    useGraphicalBrowser: overrides?.useGraphicalBrowser ?? defaults.useGraphicalBrowser,
    graphical: mergeBrowser(defaults.graphical, overrides?.graphical),
    textual: mergeBrowser(defaults.textual, overrides?.textual),
  });
}

export function resolveSettings(
  settings: SurfrawOptionsDocument['settings']
): Readonly<Record<string, SettingValue>> {
  // fromEntries defines own properties, so a `__proto__` key stays a setting
  const resolved: Record<string, SettingValue> = Object.fromEntries(
    Object.entries(settings ?? {}).map(([key, raw]) => [key, toSettingValue(key, raw)] as const)
  );
  return Object.freeze(resolved);
}

/**
 * @param content - Parsed JSON options document
 * @throws SchemaValidationError if the document does not match the schema
 */
export function resolveOptions(
  content: unknown,
  locator: BrowserLocator = new BrowserLocator()
): ResolvedOptions {
  const document = validateOptionsDocument(content);

  return {
    enable: document.enable ?? true,
    config: resolveConfig(document.config, createDefaultConfig(locator)),
    settings: resolveSettings(document.settings),
  };
}
