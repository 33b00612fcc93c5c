/**
 * SurfrawOptions - structured and free-form option shapes
 */

import type { SettingValue, RawSettingValue } from './SettingValue.js';

export interface BrowserConfig {
  /** Name or absolute path of the browser executable */
  browser: string;
  /** Command line arguments handed to the browser */
  browserArgs: readonly string[];
}

/**
 * Structured surfraw options, fully resolved against the defaults
 */
export interface SurfrawConfig {
  useGraphicalBrowser: boolean;
  graphical: BrowserConfig;
  textual: BrowserConfig;
}

/**
 * Dotted paths to the leaves of a record type. Arrays count as leaves.
 */
export type LeafPath<T> = {
  [K in keyof T & string]: T[K] extends readonly unknown[]
    ? K
    : T[K] extends object
      ? `${K}.${LeafPath<T[K]>}`
      : K;
}[keyof T & string];

export type SurfrawConfigPath = LeafPath<SurfrawConfig>;

/**
 * Settings written as-is to the config file (keys without the SURFRAW_ prefix)
 */
export type FreeformSettings = Readonly<Record<string, SettingValue>>;

/**
 * Options document as supplied by the user (JSON), before defaults
 */
export interface SurfrawOptionsDocument {
  schemaVersion?: string;
  /** When false the generator leaves the config file alone */
  enable?: boolean;
  config?: {
    useGraphicalBrowser?: boolean;
    graphical?: Partial<BrowserConfig>;
    textual?: Partial<BrowserConfig>;
  };
  settings?: Record<string, Exclude<RawSettingValue, readonly string[]>>;
}

/**
 * Options after validation and default resolution
 */
export interface ResolvedOptions {
  enable: boolean;
  config: SurfrawConfig;
  settings: FreeformSettings;
}
