import { readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read file content safely, returns null if file doesn't exist
 */
export function readFileSafe(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

let dataDir: string | null = null;

/**
 * Locate the bundled `data/` directory by walking up from this module until a
 * directory holding both `package.json` and `data/` is found. Works from
 * `src/` under the test runner and from `dist/src/` after a build.
 */
export function resolveDataDir(): string {
  if (dataDir) return dataDir;

  let current = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(current, 'package.json')) && existsSync(join(current, 'data'))) {
      dataDir = join(current, 'data');
      return dataDir;
    }
    const parent = dirname(current);
    if (parent === current) {
      throw new Error('Could not locate the cadence data directory');
    }
    current = parent;
  }
}

/**
 * Read and JSON-parse a file from the bundled data directory.
 */
export function readDataFile(name: string): unknown {
  const path = join(resolveDataDir(), name);
  const content = readFileSafe(path);
  if (content === null) {
    throw new Error(`Missing data file: ${path}`);
  }
  return JSON.parse(content);
}
