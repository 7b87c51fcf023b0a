import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { getPackageRoot } from './paths.js';

const PackageJsonSchema = z.object({
  version: z.string().min(1),
});

export function getPackageVersion(root: string = getPackageRoot()): string {
  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(join(root, 'package.json'), 'utf-8'));
  } catch {
    return '0.0.0';
  }
  const parsed = PackageJsonSchema.safeParse(pkg);
  return parsed.success ? parsed.data.version : '0.0.0';
}
