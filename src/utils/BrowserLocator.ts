/**
 * BrowserLocator - resolve default browser executables
 *
 * Looks for the browser in PATH first, then in the usual system and Nix
 * profile bin directories. When nothing is found the bare command name is
 * returned and surfraw falls back to its own PATH lookup.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export const DEFAULT_GRAPHICAL_BROWSER = 'firefox';
export const DEFAULT_TEXT_BROWSER = 'w3m';

export interface BrowserLocatorOptions {
  /** Environment to read PATH from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directories searched after PATH (default: platform specific) */
  systemDirs?: string[];
  platform?: NodeJS.Platform;
}

export class BrowserLocator {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly systemDirs: string[];

  constructor(options: BrowserLocatorOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? os.platform();
    this.systemDirs = options.systemDirs ?? this.getSystemDirs();
  }

  defaultGraphicalBrowser(): string {
    return this.locate(DEFAULT_GRAPHICAL_BROWSER);
  }

  defaultTextBrowser(): string {
    return this.locate(DEFAULT_TEXT_BROWSER);
  }

  /**
   * Resolve a command name to the first executable found
   *
   * @returns absolute path, or the name unchanged when not found
   */
  locate(command: string): string {
    if (path.isAbsolute(command)) {
      return command;
    }

    for (const dir of this.getSearchDirs()) {
      const candidate = path.join(dir, command);
      if (this.isExecutable(candidate)) {
        return candidate;
      }
    }

    return command;
  }

  /**
   * PATH entries followed by the system directories, without duplicates
   */
  getSearchDirs(): string[] {
    const pathDirs = (this.env.PATH ?? '')
      .split(path.delimiter)
      .filter(dir => dir.length > 0);

    return [...new Set([...pathDirs, ...this.systemDirs])];
  }

  private getSystemDirs(): string[] {
    const homeDir = os.homedir();

    if (this.platform === 'win32') {
      return [];
    }

    const dirs = [
      path.join(homeDir, '.nix-profile/bin'),
      '/run/current-system/sw/bin',
      '/usr/local/bin',
      '/usr/bin',
    ];

    if (this.platform === 'darwin') {
      dirs.push('/opt/homebrew/bin');
      dirs.push('/Applications/Firefox.app/Contents/MacOS');
    }

    return dirs;
  }

  private isExecutable(filePath: string): boolean {
    try {
      const stats = fs.statSync(filePath);
      if (!stats.isFile()) {
        return false;
      }
      // No execute bits on Windows
      if (this.platform === 'win32') {
        return true;
      }
      return (stats.mode & 0o111) !== 0;
    } catch {
      return false;
    }
  }
}
