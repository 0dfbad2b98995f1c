import { readFileSync } from 'node:fs';

export function getVersion(): string {
  try {
    const pkgPath = new URL('../../package.json', import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}
