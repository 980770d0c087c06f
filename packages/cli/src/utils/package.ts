import { readFileSync } from 'fs';

let cachedVersion: string | undefined;

/**
 * Version from the CLI package's package.json.
 */
export function getVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  const manifest: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  cachedVersion = typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string'
    ? manifest.version
    : '0.0.0';
  return cachedVersion;
}
