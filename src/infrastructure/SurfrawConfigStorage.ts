/**
 * SurfrawConfigStorage - reads and writes the surfraw conf file
 *
 * Default path: $XDG_CONFIG_HOME/surfraw/conf (~/.config/surfraw/conf)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PACKAGE_VERSION } from '../version.js';

export interface SurfrawConfigStorageOptions {
  /** Explicit file path; overrides the XDG lookup */
  configPath?: string;
  /** Environment to read XDG_CONFIG_HOME from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Provenance comment placed above the generated settings
 */
export function buildHeader(version: string = PACKAGE_VERSION): string {
  return [
    `# Generated by surfraw-conf ${version}.`,
    '# See http://surfraw.org or the projects README over at',
    '# https://gitlab.com/surfraw/Surfraw/-/blob/master/README',
  ].join('\n');
}

/**
 * Full file content: header, blank line, settings, trailing newline
 */
export function buildConfigFile(body: string, version: string = PACKAGE_VERSION): string {
  return `${buildHeader(version)}\n\n${body}\n`;
}

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME && path.isAbsolute(env.XDG_CONFIG_HOME)
    ? env.XDG_CONFIG_HOME
    : path.join(os.homedir(), '.config');
  return path.join(configHome, 'surfraw', 'conf');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SurfrawConfigStorage {
  private configPath: string;

  constructor(options: SurfrawConfigStorageOptions = {}) {
    this.configPath = options.configPath ?? getDefaultConfigPath(options.env);
  }

  private ensureDirectoryExists(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  /**
   * @returns file content, or null when the file does not exist
   */
  async read(): Promise<string | null> {
    if (!this.exists()) {
      return null;
    }

    try {
      return fs.readFileSync(this.configPath, 'utf-8');
    } catch (error) {
      throw new Error(
        `Failed to read surfraw config from ${this.configPath}: ${errorMessage(error)}`
      );
    }
  }

  /**
   * Write the rendered settings, prefixed with the provenance header
   */
  async save(body: string): Promise<void> {
    try {
      this.ensureDirectoryExists();
      fs.writeFileSync(this.configPath, buildConfigFile(body), { encoding: 'utf-8' });
    } catch (error) {
      throw new Error(
        `Failed to save surfraw config to ${this.configPath}: ${errorMessage(error)}`
      );
    }
  }

  getPath(): string {
    return this.configPath;
  }

  async delete(): Promise<void> {
    if (this.exists()) {
      fs.unlinkSync(this.configPath);
    }
  }
}
