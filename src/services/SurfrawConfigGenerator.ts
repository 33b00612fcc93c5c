/**
 * SurfrawConfigGenerator - options document in, surfraw conf file out
 *
 * Wires OptionsResolver, ConfigRenderer and SurfrawConfigStorage together.
 * A collision between settings and structured options aborts generation
 * before anything is written.
 */

import type { ILogger } from '../interfaces/ILogger.js';
import { SilentLogger } from '../interfaces/ILogger.js';
import { SurfrawConfigStorage } from '../infrastructure/SurfrawConfigStorage.js';
import type { ResolvedOptions } from '../models/SurfrawOptions.js';
import { BrowserLocator } from '../utils/BrowserLocator.js';
import { renderConfig } from './ConfigRenderer.js';
import { assertReservedPathsResolve } from './NamespaceProjector.js';
import { createDefaultConfig, resolveOptions } from './OptionsResolver.js';

export interface SurfrawConfigGeneratorOptions {
  storage?: SurfrawConfigStorage;
  locator?: BrowserLocator;
  logger?: ILogger;
}

export interface GeneratedConfig {
  options: ResolvedOptions;
  /** Rendered settings, one SURFRAW_ line each, no header */
  body: string;
}

export type WriteResult =
  | { written: true; path: string; body: string }
  | { written: false; reason: 'disabled' };

export class SurfrawConfigGenerator {
  private readonly storage: SurfrawConfigStorage;
  private readonly locator: BrowserLocator;
  private readonly logger: ILogger;

  constructor(options: SurfrawConfigGeneratorOptions = {}) {
    this.storage = options.storage ?? new SurfrawConfigStorage();
    this.locator = options.locator ?? new BrowserLocator();
    this.logger = options.logger ?? new SilentLogger();

    assertReservedPathsResolve(createDefaultConfig(this.locator));
  }

  /**
   * Resolve and render an options document
   *
   * @param content - Parsed JSON options document
   * @throws SchemaValidationError for malformed documents
   * @throws CollisionError when settings shadow structured options
   */
  generate(content: unknown): GeneratedConfig {
    const options = resolveOptions(content, this.locator);
    this.logger.debug('Resolved surfraw options', {
      settings: Object.keys(options.settings).length,
      useGraphicalBrowser: options.config.useGraphicalBrowser,
    });

    const result = renderConfig(options.settings, options.config);
    if (!result.ok) {
      this.logger.error('Conflicting surfraw settings', { keys: result.error.keys });
      throw result.error;
    }

    return { options, body: result.text };
  }

  /**
   * Render an options document and save it, unless it is disabled
   */
  async write(content: unknown): Promise<WriteResult> {
    const { options, body } = this.generate(content);

    if (!options.enable) {
      this.logger.info('surfraw config generation disabled, leaving file untouched', {
        path: this.storage.getPath(),
      });
      return { written: false, reason: 'disabled' };
    }

    await this.storage.save(body);
    this.logger.info('Wrote surfraw config', { path: this.storage.getPath() });

    return { written: true, path: this.storage.getPath(), body };
  }
}
