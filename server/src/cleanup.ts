import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import { log } from './logging.js';
import { cleanupError, describeError, errorCode, type Problem } from './errors.js';
import type { MediaItem } from './types.js';

// path.relative compares case-insensitively on win32
export function isStrictlyInside(dir: string, root: string) {
  const rel = path.relative(path.resolve(root), path.resolve(dir));
  return !!rel && rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

async function containsVideo(dir: string, videoExts: ReadonlySet<string>) {
  const files = await fg('**/*', { cwd: dir, onlyFiles: true, dot: true });
  return files.some(f => videoExts.has(path.extname(f).toLowerCase()));
}

/**
 * After a batch, remove the source folders that held moved items when no
 * video is left anywhere below them. Leftover companions and junk go with the
 * folder. Source roots themselves are never removed.
 */
export async function cleanupSourceDirs(
  appliedItems: readonly MediaItem[],
  sourceRoots: readonly string[],
  videoExtensions: readonly string[],
): Promise<Problem[]> {
  const errors: Problem[] = [];
  const videoExts = new Set(videoExtensions.map(e => e.toLowerCase()));
  const dirs = Array.from(new Set(appliedItems.map(it => path.dirname(path.resolve(it.sourcePath)))))
    .sort((a, b) => b.split(path.sep).length - a.split(path.sep).length || (a < b ? -1 : a > b ? 1 : 0));

  for (const dir of dirs) {
    if (!sourceRoots.some(root => isStrictlyInside(dir, root))) {
      log('debug', `cleanup: ${dir} is not inside a source folder, skipped`);
      continue;
    }
    try {
      await fs.promises.stat(dir);
    } catch (e) {
      if (errorCode(e) === 'ENOENT') continue;
      errors.push(cleanupError(dir, e));
      continue;
    }
    try {
      if (await containsVideo(dir, videoExts)) {
        log('debug', `cleanup: ${dir} still holds video files, kept`);
        continue;
      }
      await fs.promises.rm(dir, { recursive: true, force: true });
      log('info', `cleanup: removed ${dir}`);
    } catch (e) {
      log('warn', `cleanup failed for ${dir}: ${describeError(e)}`);
      errors.push(cleanupError(dir, e));
    }
  }
  return errors;
}
