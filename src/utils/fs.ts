import { existsSync, mkdirSync, readdirSync, statSync } from 'fs';
import { extname, join } from 'path';

const DEFAULT_IGNORE = new Set(['node_modules', '.git', 'dist', 'coverage']);

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Walk a directory tree recursively, yielding file paths.
 * Unreadable directories are skipped; hidden entries are ignored.
 */
export function* walkDirSync(
  dir: string,
  options: { ignore?: Set<string>; maxDepth?: number; includeHidden?: boolean } = {},
): Generator<string> {
  const { ignore = DEFAULT_IGNORE, maxDepth = 20, includeHidden = false } = options;

  function* walk(currentDir: string, depth: number): Generator<string> {
    if (depth > maxDepth) return;

    let entries;
    try {
      entries = readdirSync(currentDir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      if (ignore.has(entry.name)) continue;
      if (!includeHidden && entry.name.startsWith('.')) continue;

      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        yield* walk(fullPath, depth + 1);
      } else if (entry.isFile()) {
        yield fullPath;
      }
    }
  }

  yield* walk(dir, 0);
}

/**
 * Source files under `dir` whose extension is in `extensions` (with dot).
 */
export function listSourceFiles(dir: string, extensions: readonly string[]): string[] {
  if (!existsSync(dir)) return [];
  const wanted = new Set(extensions);
  const files: string[] = [];
  for (const file of walkDirSync(dir)) {
    if (wanted.has(extname(file))) files.push(file);
  }
  return files;
}

/**
 * Total size in bytes and file count for every file under the given
 * directories. A file reachable from two roots is counted once.
 */
export function directorySize(dirs: readonly string[]): { bytes: number; files: number } {
  const seen = new Set<string>();
  let bytes = 0;

  for (const dir of dirs) {
    if (!existsSync(dir)) continue;
    for (const file of walkDirSync(dir, { ignore: new Set(), includeHidden: true })) {
      if (seen.has(file)) continue;
      seen.add(file);
      try {
        bytes += statSync(file).size;
      } catch {
        seen.delete(file);
      }
    }
  }

  return { bytes, files: seen.size };
}
