/**
 * Version utility - reads version from package.json
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

function readVersion(pkgPath: string): string {
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return FALLBACK_VERSION;
}

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  // src/interface/cli/ and dist/interface/cli/ both sit three levels below the package root
  const thisDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(thisDir, '..', '..', '..', 'package.json');
  try {
    cachedVersion = readVersion(pkgPath);
  } catch {
    cachedVersion = FALLBACK_VERSION;
  }
  return cachedVersion;
}
