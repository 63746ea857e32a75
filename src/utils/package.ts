import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

const PACKAGE_JSON_PATH = fileURLToPath(new URL('../../package.json', import.meta.url));

/**
 * Version of the installed CLI, read from package.json next to src/ or dist/.
 */
export function getVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf8'));
    const version: unknown = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'version') : undefined;
    return typeof version === 'string' ? version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}
