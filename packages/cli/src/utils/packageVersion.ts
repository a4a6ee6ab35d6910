/**
 * Version lookup from the CLI's own package.json
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

export function readPackageVersion(packageJsonUrl: URL = PACKAGE_JSON_URL): string {
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(packageJsonUrl), 'utf-8'));
  if (typeof pkg !== 'object' || pkg === null || !('version' in pkg) || typeof pkg.version !== 'string') {
    throw new Error(`No version field in ${fileURLToPath(packageJsonUrl)}`);
  }
  return pkg.version;
}
