import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  SurfrawConfigStorage,
  buildHeader,
  buildConfigFile,
  getDefaultConfigPath,
} from '../../../src/infrastructure/SurfrawConfigStorage.js';
import { PACKAGE_VERSION } from '../../../src/version.js';
import { createTempDir } from '../../fixtures.js';

describe('SurfrawConfigStorage', () => {
  let testDir: string;
  let configPath: string;
  let storage: SurfrawConfigStorage;

  beforeEach(() => {
    testDir = createTempDir('storage');
    configPath = path.join(testDir, 'surfraw', 'conf');
    storage = new SurfrawConfigStorage({ configPath });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfigPath', () => {
    it('uses XDG_CONFIG_HOME when set', () => {
      expect(getDefaultConfigPath({ XDG_CONFIG_HOME: '/xdg/config' })).toBe(
        path.join('/xdg/config', 'surfraw', 'conf')
      );
    });

    it('falls back to ~/.config', () => {
      expect(getDefaultConfigPath({})).toBe(path.join(os.homedir(), '.config', 'surfraw', 'conf'));
    });

    it('ignores a relative XDG_CONFIG_HOME', () => {
      expect(getDefaultConfigPath({ XDG_CONFIG_HOME: 'relative' })).toBe(
        path.join(os.homedir(), '.config', 'surfraw', 'conf')
      );
    });

    it('is used when no explicit path is given', () => {
      const xdgStorage = new SurfrawConfigStorage({ env: { XDG_CONFIG_HOME: testDir } });

      expect(xdgStorage.getPath()).toBe(configPath);
    });
  });

  describe('buildConfigFile', () => {
    it('places the header, a blank line and the settings', () => {
      expect(buildConfigFile('SURFRAW_results=15', '9.9.9')).toBe(
        '# Generated by surfraw-conf 9.9.9.\n' +
        '# See http://surfraw.org or the projects README over at\n' +
        '# https://gitlab.com/surfraw/Surfraw/-/blob/master/README\n' +
        '\n' +
        'SURFRAW_results=15\n'
      );
    });

    it('stamps the package version by default', () => {
      expect(buildHeader().split('\n')[0]).toBe(`# Generated by surfraw-conf ${PACKAGE_VERSION}.`);
    });
  });

  describe('save / read', () => {
    it('returns null when the file does not exist', async () => {
      expect(storage.exists()).toBe(false);
      expect(await storage.read()).toBeNull();
    });

    it('creates missing directories and writes the file', async () => {
      await storage.save('SURFRAW_graphical=yes');

      expect(storage.exists()).toBe(true);
      expect(fs.readFileSync(configPath, 'utf-8')).toBe(buildConfigFile('SURFRAW_graphical=yes'));
      expect(await storage.read()).toBe(buildConfigFile('SURFRAW_graphical=yes'));
    });

    it('overwrites an existing file', async () => {
      await storage.save('SURFRAW_graphical=yes');
      await storage.save('SURFRAW_graphical=no');

      expect(await storage.read()).toBe(buildConfigFile('SURFRAW_graphical=no'));
    });

    it('wraps write failures with the target path', async () => {
      // A regular file where the directory should be
      fs.writeFileSync(path.join(testDir, 'surfraw'), '');

      await expect(storage.save('SURFRAW_graphical=yes')).rejects.toThrow(
        `Failed to save surfraw config to ${configPath}`
      );
    });
  });

  describe('delete', () => {
    it('removes the file', async () => {
      await storage.save('SURFRAW_graphical=yes');
      await storage.delete();

      expect(storage.exists()).toBe(false);
    });

    it('does nothing when the file is missing', async () => {
      await expect(storage.delete()).resolves.toBeUndefined();
    });
  });
});
