import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

// src/utils and dist/utils both sit two levels below the project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../../package.json');

let cachedVersion: string | undefined;

/**
 * Version of this CLI as declared in its package.json
 */
export function getVersion(): string {
  if (cachedVersion === undefined) {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    cachedVersion =
      typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
        ? parsed.version
        : '0.0.0';
  }
  return cachedVersion;
}
