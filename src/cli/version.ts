import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

function readPackageVersion(pkgPath: string): string | null {
  let source: string;
  try {
    source = readFileSync(pkgPath, 'utf8');
  } catch {
    // Installed without package.json next to the sources.
    return null;
  }
  const pkg: unknown = JSON.parse(source);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return null;
}

export async function getCliVersion(): Promise<string> {
  const envVersion = process.env.PTYDECK_VERSION?.trim();
  if (envVersion) {
    return envVersion;
  }

  return readPackageVersion(resolve(__dirname, '..', '..', 'package.json')) ?? 'unknown';
}
