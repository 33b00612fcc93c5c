/**
 * SchemaValidator - JSON Schema validation of surfraw options documents
 *
 * Uses ajv for runtime validation. Schemas are loaded from the schemas/
 * directory at the package root.
 */

import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { SurfrawOptionsDocument } from '../models/SurfrawOptions.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const OPTIONS_SCHEMA_NAME = 'surfraw-options-v1.0';
const OPTIONS_SCHEMA_FILE = `${OPTIONS_SCHEMA_NAME}.json`;

/**
 * Find the schema directory
 * src/utils and dist/utils are both two levels below the package root
 */
function findSchemaDir(): string {
  const candidates = [
    path.join(__dirname, '../../schemas'),
    path.join(process.cwd(), 'schemas'),
  ];

  for (const dir of candidates) {
    if (fs.existsSync(path.join(dir, OPTIONS_SCHEMA_FILE))) {
      return dir;
    }
  }

  return candidates[0];
}

let _schemaDir: string | null = null;

export function getSchemaDir(): string {
  if (!_schemaDir) {
    _schemaDir = findSchemaDir();
  }
  return _schemaDir;
}

/**
 * Custom error for schema validation failures
 */
export class SchemaValidationError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly errors: ErrorObject[]
  ) {
    super(SchemaValidationError.formatErrors(schemaName, errors));
    this.name = 'SchemaValidationError';
  }

  static formatErrors(schemaName: string, errors: ErrorObject[]): string {
    const lines = errors.map(e => {
      const pathStr = e.instancePath || '/';
      const msg = e.message ?? 'Unknown error';
      const extra = 'additionalProperty' in e.params
        ? ` (${String(e.params.additionalProperty)})`
        : '';
      return `  - ${pathStr}: ${msg}${extra}`;
    });

    return `Invalid ${schemaName}:\n` + lines.join('\n');
  }
}

const SUPPORTED_VERSIONS = { min: '1.0', max: '1.0' } as const;

function compareVersions(a: string, b: string): number {
  const [aMajor, aMinor] = a.split('.').map(Number);
  const [bMajor, bMinor] = b.split('.').map(Number);

  if (aMajor !== bMajor) return aMajor - bMajor;
  return aMinor - bMinor;
}

/**
 * @throws Error if the version is outside the supported range
 */
export function checkSchemaVersion(version: string): void {
  if (compareVersions(version, SUPPORTED_VERSIONS.max) > 0) {
    throw new Error(
      `Options schema version ${version} is not supported.\n` +
      `Maximum supported version is ${SUPPORTED_VERSIONS.max}.`
    );
  }

  if (compareVersions(version, SUPPORTED_VERSIONS.min) < 0) {
    throw new Error(
      `Options schema version ${version} is deprecated.\n` +
      `Minimum supported version is ${SUPPORTED_VERSIONS.min}.`
    );
  }
}

let _validator: ValidateFunction<SurfrawOptionsDocument> | null = null;

function loadSchema(filename: string): SchemaObject {
  const schemaDir = getSchemaDir();
  const filePath = path.join(schemaDir, filename);
  if (!fs.existsSync(filePath)) {
    throw new Error(
      `Schema file not found: ${filePath}\n` +
      `Please ensure the schemas directory is properly installed.`
    );
  }
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function getOptionsValidator(): ValidateFunction<SurfrawOptionsDocument> {
  if (!_validator) {
    const ajv = new Ajv.default({
      allErrors: true,           // Report every violation, not just the first
      strict: false,
    });
    _validator = ajv.compile<SurfrawOptionsDocument>(loadSchema(OPTIONS_SCHEMA_FILE));
  }
  return _validator;
}

/**
 * Validate an options document and its schema version
 *
 * @param content - Parsed JSON content
 * @throws SchemaValidationError if invalid
 */
export function validateOptionsDocument(content: unknown): SurfrawOptionsDocument {
  const validator = getOptionsValidator();
  if (!validator(content)) {
    throw new SchemaValidationError(OPTIONS_SCHEMA_NAME, validator.errors ?? []);
  }
  if (content.schemaVersion) {
    checkSchemaVersion(content.schemaVersion);
  }
  return content;
}
