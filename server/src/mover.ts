import fs from 'fs';
import path from 'path';
import { log } from './logging.js';
import { sanitize } from './renamer.js';
import { describeError, errorCode, moveError, type Problem } from './errors.js';
import type { MediaItem, ProgressListener } from './types.js';

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

export type RenameFn = (from: string, to: string) => Promise<void>;

export interface MoveOptions {
  companionExtensions: readonly string[];
  chunkSize?: number;
  /** Atomic rename; replaced in tests to simulate a move across volumes */
  rename?: RenameFn;
}

type AddBytes = (n: number) => void;

async function fileSize(p: string) {
  try {
    return (await fs.promises.stat(p)).size;
  } catch (e) {
    log('debug', `stat failed for ${p}: ${describeError(e)}`);
    return 0;
  }
}

/** Files next to `sourcePath` with exactly the same stem and a companion extension. */
export async function listCompanionFiles(sourcePath: string, companionExtensions: readonly string[]) {
  const dir = path.dirname(sourcePath);
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const exts = new Set(companionExtensions.map(e => e.toLowerCase()));
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  return entries
    .filter(e => {
      if (!e.isFile()) return false;
      const ext = path.extname(e.name);
      return e.name.slice(0, e.name.length - ext.length) === stem && exts.has(ext.toLowerCase());
    })
    .map(e => path.join(dir, e.name))
    .sort();
}

/** Progress denominator: every primary file plus every companion found now. */
export async function computeBatchBytes(items: readonly MediaItem[], companionExtensions: readonly string[]) {
  let total = 0;
  for (const it of items) {
    total += await fileSize(it.sourcePath);
    try {
      for (const c of await listCompanionFiles(it.sourcePath, companionExtensions)) total += await fileSize(c);
    } catch (e) {
      log('debug', `could not list companions of ${it.sourcePath}: ${describeError(e)}`);
    }
  }
  return total;
}

async function copyWithProgress(src: string, dst: string, addBytes: AddBytes, chunkSize: number) {
  const input = await fs.promises.open(src, 'r');
  try {
    const output = await fs.promises.open(dst, 'w');
    try {
      const buf = Buffer.alloc(chunkSize);
      for (;;) {
        const { bytesRead } = await input.read(buf, 0, chunkSize, null);
        if (bytesRead === 0) break;
        let off = 0;
        while (off < bytesRead) {
          const { bytesWritten } = await output.write(buf, off, bytesRead - off);
          off += bytesWritten;
        }
        addBytes(bytesRead);
      }
    } finally {
      await output.close();
    }
  } finally {
    await input.close();
  }
}

async function movePath(src: string, dst: string, addBytes: AddBytes, rename: RenameFn, chunkSize: number) {
  const st = await fs.promises.stat(src);
  if (path.resolve(src) === path.resolve(dst)) {
    addBytes(st.size);
    return;
  }
  await fs.promises.mkdir(path.dirname(dst), { recursive: true });

  // Overwrite semantics: an existing destination goes first
  try {
    await fs.promises.unlink(dst);
  } catch (e) {
    if (errorCode(e) !== 'ENOENT') log('debug', `could not remove existing ${dst}: ${describeError(e)}`);
  }

  try {
    await rename(src, dst);
    addBytes(st.size);
    return;
  } catch (e) {
    if (errorCode(e) !== 'EXDEV') throw e;
  }

  log('debug', `cross-device move, copying ${src} -> ${dst}`);
  try {
    await copyWithProgress(src, dst, addBytes, chunkSize);
  } catch (e) {
    await fs.promises.rm(dst, { force: true }).catch((rmErr: unknown) => {
      log('debug', `could not remove partial copy ${dst}: ${describeError(rmErr)}`);
    });
    throw e;
  }
  try {
    await fs.promises.utimes(dst, st.atime, st.mtime);
  } catch (e) {
    log('debug', `timestamps not preserved on ${dst}: ${describeError(e)}`);
  }
  try {
    await fs.promises.unlink(src);
  } catch (e) {
    log('warn', `copied but could not delete source ${src}: ${describeError(e)}`);
  }
}

const defaultRename: RenameFn = (from, to) => fs.promises.rename(from, to);

/**
 * Move each item and its companions, one after another. A failure is recorded
 * and the batch carries on with the next file.
 */
export async function applyMoves(
  items: readonly MediaItem[],
  opts: MoveOptions,
  onProgress?: ProgressListener,
): Promise<Problem[]> {
  const errors: Problem[] = [];
  const rename = opts.rename ?? defaultRename;
  const chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const total = await computeBatchBytes(items, opts.companionExtensions);
  let done = 0;

  const reporter = (label: string): AddBytes => (bytes) => {
    done += bytes;
    if (!onProgress) return;
    try {
      onProgress({ bytes, done, total, label });
    } catch (e) {
      log('debug', `progress listener failed: ${describeError(e)}`);
    }
  };

  for (const item of items) {
    log('info', `move: ${item.sourcePath} -> ${item.destPath}`);
    try {
      await fs.promises.mkdir(item.destDir, { recursive: true });
      await movePath(item.sourcePath, item.destPath, reporter(item.destFileName), rename, chunkSize);
    } catch (e) {
      log('error', `move failed for ${item.sourcePath} -> ${item.destPath}: ${describeError(e)}`);
      errors.push(moveError(item.sourcePath, item.destPath, e));
      continue;
    }

    let companions: string[];
    try {
      companions = await listCompanionFiles(item.sourcePath, opts.companionExtensions);
    } catch (e) {
      log('warn', `could not list companions of ${item.sourcePath}: ${describeError(e)}`);
      errors.push(moveError(path.dirname(item.sourcePath), item.destDir, e));
      continue;
    }
    const destStem = path.basename(item.destPath, path.extname(item.destPath));
    for (const c of companions) {
      const target = path.join(path.dirname(item.destPath), sanitize(`${destStem}${path.extname(c)}`));
      try {
        await movePath(c, target, reporter(path.basename(target)), rename, chunkSize);
      } catch (e) {
        log('error', `move failed for ${c} -> ${target}: ${describeError(e)}`);
        errors.push(moveError(c, target, e));
      }
    }
  }

  log('info', `Moved ${items.length} item(s) with ${errors.length} error(s)`);
  return errors;
}
