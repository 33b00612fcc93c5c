import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SurfrawConfig } from '../src/models/SurfrawOptions.js';

export const FIREFOX_PATH = '/opt/browsers/bin/firefox';
export const W3M_PATH = '/opt/browsers/bin/w3m';

export function createConfig(overrides: Partial<SurfrawConfig> = {}): SurfrawConfig {
  return {
    useGraphicalBrowser: true,
    graphical: { browser: FIREFOX_PATH, browserArgs: [''] },
    textual: { browser: W3M_PATH, browserArgs: [''] },
    ...overrides,
  };
}

export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `surfraw-conf-${label}-`));
}

/**
 * Create an executable stub file named `name` inside `dir`
 */
export function createExecutable(dir: string, name: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, '#!/bin/sh\n');
  fs.chmodSync(filePath, 0o755);
  return filePath;
}
