/**
 * surfraw-conf
 *
 * Render structured surfraw options into the SURFRAW_<KEY>=<VALUE> conf
 * file read by surfraw, rejecting settings that shadow structured options.
 *
 * @packageDocumentation
 */

// ═══════════════════════════════════════════════════════════════
// Version
// ═══════════════════════════════════════════════════════════════
export { PACKAGE_VERSION } from './version.js';

// ═══════════════════════════════════════════════════════════════
// Logging
// ═══════════════════════════════════════════════════════════════
export type { ILogger, LogLevel } from './interfaces/ILogger.js';
export { SilentLogger } from './interfaces/ILogger.js';
export { ConsoleLogger } from './outputs/ConsoleLogger.js';
export type { ConsoleLoggerOptions } from './outputs/ConsoleLogger.js';

// ═══════════════════════════════════════════════════════════════
// Models
// ═══════════════════════════════════════════════════════════════
export type { SettingValue, SettingKind, RawSettingValue } from './models/SettingValue.js';
export {
  InvalidSettingValueError,
  toSettingValue,
  booleanValue,
  integerValue,
  textValue,
  stringListValue,
} from './models/SettingValue.js';
export type {
  BrowserConfig,
  SurfrawConfig,
  SurfrawConfigPath,
  LeafPath,
  FreeformSettings,
  SurfrawOptionsDocument,
  ResolvedOptions,
} from './models/SurfrawOptions.js';

// ═══════════════════════════════════════════════════════════════
// Rendering core
// ═══════════════════════════════════════════════════════════════
export { RESERVED_SETTINGS, isReservedKey } from './config/ReservedSettings.js';
export type { ReservedKey, ReservedSettingsMap } from './config/ReservedSettings.js';
export { formatValue, isEffectivelyEmpty, NONE_VALUE } from './utils/ValueFormatter.js';
export {
  projectSettings,
  assertReservedPathsResolve,
  getAtPath,
  ReservedPathError,
} from './services/NamespaceProjector.js';
export type { ProjectedSettings } from './services/NamespaceProjector.js';
export { validateNoCollisions, findCollisions } from './services/validation/CollisionValidator.js';
export type { CollisionCheckResult } from './services/validation/CollisionValidator.js';
export { CollisionError } from './services/validation/CollisionError.js';
export type { Collision } from './services/validation/CollisionError.js';
export {
  renderConfig,
  settingsToConfigLines,
  formatConfigLine,
  SURFRAW_KEY_PREFIX,
} from './services/ConfigRenderer.js';
export type { RenderResult } from './services/ConfigRenderer.js';

// ═══════════════════════════════════════════════════════════════
// Options loading & persistence
// ═══════════════════════════════════════════════════════════════
export {
  resolveOptions,
  resolveConfig,
  resolveSettings,
  createDefaultConfig,
  DEFAULT_BROWSER_ARGS,
} from './services/OptionsResolver.js';
export {
  validateOptionsDocument,
  checkSchemaVersion,
  SchemaValidationError,
} from './utils/SchemaValidator.js';
export {
  BrowserLocator,
  DEFAULT_GRAPHICAL_BROWSER,
  DEFAULT_TEXT_BROWSER,
} from './utils/BrowserLocator.js';
export type { BrowserLocatorOptions } from './utils/BrowserLocator.js';
export {
  SurfrawConfigStorage,
  buildHeader,
  buildConfigFile,
  getDefaultConfigPath,
} from './infrastructure/SurfrawConfigStorage.js';
export type { SurfrawConfigStorageOptions } from './infrastructure/SurfrawConfigStorage.js';
export { SurfrawConfigGenerator } from './services/SurfrawConfigGenerator.js';
export type {
  SurfrawConfigGeneratorOptions,
  GeneratedConfig,
  WriteResult,
} from './services/SurfrawConfigGenerator.js';
