import { readFileSync } from 'node:fs';
import { z } from 'zod';

const packageSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof packageSchema>;

/** package.json sits one level above both src/ and dist/. */
export function readPackageInfo(url: URL = new URL('../package.json', import.meta.url)): PackageInfo {
  return packageSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

export const versionInfo: PackageInfo = readPackageInfo();
