/**
 * Package version, read from package.json
 */
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/ and dist/ both sit directly below the package root
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson: { version: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));

export const PACKAGE_VERSION: string = packageJson.version;
