import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getPackageRoot } from '../src/utils/paths.js';
import { getPackageVersion } from '../src/utils/version.js';

describe('package metadata', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'esios-mcp-version-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('finds the nearest package.json above a directory', () => {
    const nested = join(testDir, 'dist', 'utils');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(testDir, 'package.json'), JSON.stringify({ name: 'x', version: '3.2.1' }));

    expect(getPackageRoot(nested)).toBe(testDir);
    expect(getPackageVersion(getPackageRoot(nested))).toBe('3.2.1');
  });

  it('falls back to 0.0.0 without a readable version', () => {
    expect(getPackageVersion(testDir)).toBe('0.0.0');

    writeFileSync(join(testDir, 'package.json'), '{ not json');
    expect(getPackageVersion(testDir)).toBe('0.0.0');

    writeFileSync(join(testDir, 'package.json'), JSON.stringify({ name: 'x' }));
    expect(getPackageVersion(testDir)).toBe('0.0.0');
  });

  it('reads this package version from the repository root', () => {
    expect(getPackageVersion()).toBe('0.1.0');
  });
});
