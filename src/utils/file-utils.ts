import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';

export function readFileContent(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

const MANIFEST_PATTERNS = ['**/*.yaml', '**/*.yml'];

/**
 * Order files the way a depth-first walk over sorted directory entries visits them:
 * compare path segment by segment, so `a/x.yaml` comes before `a-b.yaml`.
 */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split(/[/\\]/);
  const right = b.split(/[/\\]/);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

/** All YAML manifests below a directory, absolute paths, in walk order. */
export function findManifestFiles(dir: string): string[] {
  const absDir = path.resolve(dir);
  const files = globSync(MANIFEST_PATTERNS, {
    cwd: absDir,
    nodir: true,
    dot: true,
  });

  return [...new Set(files)]
    .sort(compareWalkOrder)
    .map(rel => path.join(absDir, rel));
}
