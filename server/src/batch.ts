import { log } from './logging.js';
import { applyMoves } from './mover.js';
import { cleanupSourceDirs } from './cleanup.js';
import type { AppConfig } from './config.js';
import { formatProblem, type Problem } from './errors.js';
import type { MediaItem, ProgressListener } from './types.js';

export type BatchSettings = Pick<AppConfig, 'sourceRoots' | 'videoExtensions' | 'companionExtensions' | 'chunkSize'>;

export interface BatchResult {
  /** Items whose primary file reached its destination */
  moved: number;
  totalBytes: number;
  errors: Problem[];
}

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(n: number) {
  let v = n;
  let u = 0;
  while (v >= 1024 && u < UNITS.length - 1) {
    v /= 1024;
    u++;
  }
  return u === 0 ? `${v} B` : `${v.toFixed(1)} ${UNITS[u]}`;
}

export async function runBatch(
  items: readonly MediaItem[],
  config: BatchSettings,
  onProgress?: ProgressListener,
): Promise<BatchResult> {
  let totalBytes = 0;
  const moveErrors = await applyMoves(
    items,
    { companionExtensions: config.companionExtensions, chunkSize: config.chunkSize },
    (p) => {
      totalBytes = p.done;
      onProgress?.(p);
    },
  );
  const failed = new Set(moveErrors.map(e => e.path));
  const applied = items.filter(it => !failed.has(it.sourcePath));
  const cleanupErrors = await cleanupSourceDirs(applied, config.sourceRoots, config.videoExtensions);
  const errors = [...moveErrors, ...cleanupErrors];

  log('info', `Batch finished: ${applied.length}/${items.length} moved, ${formatBytes(totalBytes)}, ${errors.length} error(s)`);
  for (const p of errors) log('warn', `Batch error: ${formatProblem(p)}`);
  return { moved: applied.length, totalBytes, errors };
}
