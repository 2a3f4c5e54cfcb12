import { readFileSync } from 'fs';
import { z } from 'zod';

const PackageManifest = z.object({
  name: z.string(),
  version: z.string(),
});

export function readPackageVersion(): string {
  const manifestUrl = new URL('../../package.json', import.meta.url);
  const manifest = PackageManifest.parse(JSON.parse(readFileSync(manifestUrl, 'utf-8')));
  return `${manifest.name} ${manifest.version}`;
}
