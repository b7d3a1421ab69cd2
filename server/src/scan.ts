import fg from 'fast-glob';
import path from 'path';
import { log } from './logging.js';
import { validateRoots } from './config.js';
import { analysisWarning, describeError, type Problem } from './errors.js';
import { planDestination } from './renamer.js';
import type { Classifier } from './parse.js';
import type { MediaDescriptor, MediaItem } from './types.js';

export interface PlanBuilderOptions {
  classifier: Classifier;
  videoExtensions: readonly string[];
  samplePattern: RegExp;
  /** Files and folders whose name starts with this are skipped */
  hiddenMarker: string;
  defaultExtension: string;
}

export interface PlanResult {
  items: MediaItem[];
  warnings: Problem[];
}

export function toMediaItem(
  sourcePath: string,
  d: MediaDescriptor,
  destinationRoot: string,
  defaultExtension: string,
): MediaItem {
  const dest = planDestination(d, destinationRoot, { defaultExtension });
  if (d.kind === 'movie') {
    return { sourcePath, contentType: 'movie', rule: d.rule, ...dest };
  }
  return {
    sourcePath,
    contentType: 'series',
    rule: d.rule,
    showTitle: d.showTitle,
    season: d.season,
    episodes: [...d.episodes],
    ...dest,
  };
}

/** Video files under `root`, hidden entries and sample releases excluded, sorted by path. */
export async function listVideoFiles(root: string, opts: Omit<PlanBuilderOptions, 'classifier' | 'defaultExtension'>) {
  const marker = fg.escapePath(opts.hiddenMarker);
  const entries = await fg('**/*', {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    ignore: [`**/${marker}*`, `**/${marker}*/**`],
  });
  const videoExts = new Set(opts.videoExtensions);
  return entries
    .map(e => path.normalize(e))
    .filter(f => {
      const name = path.basename(f);
      return videoExts.has(path.extname(name).toLowerCase()) && !opts.samplePattern.test(name);
    })
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Walk every source root and plan a destination for each video file. Nothing
 * on disk is created or changed. A file that cannot be planned becomes a
 * warning and is left out.
 */
export async function buildPlan(
  sourceRoots: readonly string[],
  destinationRoot: string,
  opts: PlanBuilderOptions,
): Promise<PlanResult> {
  await validateRoots(sourceRoots, destinationRoot);

  const items: MediaItem[] = [];
  const warnings: Problem[] = [];
  const seen = new Set<string>();

  for (const root of sourceRoots) {
    let files: string[];
    try {
      files = await listVideoFiles(root, opts);
    } catch (e) {
      log('warn', `Could not list ${root}: ${describeError(e)}`);
      warnings.push(analysisWarning(root, e));
      continue;
    }
    for (const file of files) {
      if (seen.has(file)) continue;
      seen.add(file);
      try {
        const d = await opts.classifier.classify(path.basename(file), path.basename(path.dirname(file)));
        items.push(toMediaItem(file, d, destinationRoot, opts.defaultExtension));
      } catch (e) {
        log('warn', `Error analysing '${file}': ${describeError(e)}`);
        warnings.push(analysisWarning(file, e));
      }
    }
  }

  log('info', `Plan built: ${items.length} item(s), ${warnings.length} warning(s) from ${sourceRoots.length} source folder(s)`);
  return { items, warnings };
}
