/**
 * SchemaValidator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
  validateOptionsDocument,
  checkSchemaVersion,
  getSchemaDir,
  SchemaValidationError,
  OPTIONS_SCHEMA_NAME,
} from '../../../src/utils/SchemaValidator.js';

describe('SchemaValidator', () => {
  it('finds the options schema file', () => {
    expect(fs.existsSync(path.join(getSchemaDir(), `${OPTIONS_SCHEMA_NAME}.json`))).toBe(true);
  });

  describe('validateOptionsDocument', () => {
    it('accepts a complete document', () => {
      const document = {
        schemaVersion: '1.0',
        enable: true,
        config: {
          useGraphicalBrowser: false,
          graphical: { browser: 'firefox', browserArgs: ['-P', 'default'] },
          textual: { browser: 'w3m', browserArgs: [] },
        },
        settings: { escape_url_args: true, results: 15, lang: 'en' },
      };

      expect(validateOptionsDocument(document)).toBe(document);
    });

    it('accepts an empty document', () => {
      expect(validateOptionsDocument({})).toEqual({});
    });

    it('rejects non-object documents', () => {
      expect(() => validateOptionsDocument('settings')).toThrow(SchemaValidationError);
      expect(() => validateOptionsDocument(null)).toThrow(SchemaValidationError);
    });

    it('rejects unknown top-level fields and names them', () => {
      try {
        validateOptionsDocument({ bogus: 1 });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaValidationError);
        if (!(error instanceof SchemaValidationError)) return;
        expect(error.schemaName).toBe('surfraw-options-v1.0');
        expect(error.errors[0].instancePath).toBe('');
        expect(error.message).toContain('  - /: ');
        expect(error.message).toContain('(bogus)');
      }
    });

    it('points at the offending setting', () => {
      try {
        validateOptionsDocument({ settings: { results: 1.5 } });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaValidationError);
        if (!(error instanceof SchemaValidationError)) return;
        expect(error.errors).toHaveLength(1);
        expect(error.errors[0].instancePath).toBe('/settings/results');
      }
    });

    it('rejects settings keys that cannot form a variable name', () => {
      expect(() => validateOptionsDocument({ settings: { 'bad-key': 'x' } })).toThrow(
        SchemaValidationError
      );
    });

    it('rejects an empty browser name', () => {
      expect(() => validateOptionsDocument({ config: { graphical: { browser: '' } } })).toThrow(
        SchemaValidationError
      );
    });

    it('rejects unsupported schema versions', () => {
      expect(() => validateOptionsDocument({ schemaVersion: '2.0' })).toThrow(
        'Options schema version 2.0 is not supported.'
      );
    });
  });

  describe('checkSchemaVersion', () => {
    it('accepts the current version', () => {
      expect(() => checkSchemaVersion('1.0')).not.toThrow();
    });

    it('rejects newer versions', () => {
      expect(() => checkSchemaVersion('1.1')).toThrow('Maximum supported version is 1.0.');
    });

    it('rejects older versions', () => {
      expect(() => checkSchemaVersion('0.9')).toThrow('Minimum supported version is 1.0.');
    });
  });
});
