import path from 'path';
import type { MediaDescriptor, MovieDescriptor, SeriesDescriptor } from './types.js';

const RESERVED_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

export const MOVIES_DIR = 'Movies';
export const SERIES_DIR = 'Series';

/**
 * Make one path segment safe on Windows, macOS and Linux: illegal characters
 * become underscores, whitespace collapses, and reserved device names such as
 * `CON` or `lpt1.txt` get a leading underscore.
 */
export function sanitize(s: string) {
  if (!s) return '';
  const cleaned = String(s)
    .replace(/[<>:"/\\|?*\u0000-\u001F]/g, '_')
    .replace(/\s+/g, ' ')
    .trim();
  const dot = cleaned.indexOf('.');
  const base = dot >= 0 ? cleaned.slice(0, dot) : cleaned;
  if (RESERVED_NAMES.has(base.toUpperCase())) return `_${cleaned}`;
  return cleaned;
}

export function pad2(n: number) { return String(n).padStart(2, '0'); }

/** `04x05`, or `04x05-07` when the file holds several episodes. */
export function episodeLabel(season: number, episodes: readonly number[]) {
  const first = episodes[0] ?? 1;
  const last = episodes[episodes.length - 1] ?? first;
  const ss = pad2(season);
  return episodes.length > 1 ? `${ss}x${pad2(first)}-${pad2(last)}` : `${ss}x${pad2(first)}`;
}

export interface PlanOptions {
  /** Used when the source file has no extension, e.g. `.mkv` */
  defaultExtension: string;
}

export interface PlannedDestination {
  destDir: string;
  destFileName: string;
  destPath: string;
}

function normalizeExt(ext: string, fallback: string) {
  const e = ext || fallback;
  if (!e) return '';
  return e.startsWith('.') ? e : `.${e}`;
}

export function movieOutputPath(d: MovieDescriptor, root: string, opts: PlanOptions): PlannedDestination {
  const ext = normalizeExt(d.extension, opts.defaultExtension);
  const title = sanitize(d.title);
  const base = d.year ? `${title} (${d.year})` : title;
  const destDir = path.join(root, MOVIES_DIR);
  const destFileName = sanitize(`${base}${ext}`);
  return { destDir, destFileName, destPath: path.join(destDir, destFileName) };
}

export function episodeOutputPath(d: SeriesDescriptor, root: string, opts: PlanOptions): PlannedDestination {
  const ext = normalizeExt(d.extension, opts.defaultExtension);
  const show = sanitize(d.showTitle);
  const epTitle = d.episodeTitle ? sanitize(d.episodeTitle) : '';
  const destDir = path.join(root, SERIES_DIR, show, sanitize(`Season ${pad2(d.season)}`));
  const file = `${show} - ${episodeLabel(d.season, d.episodes)}${epTitle ? ` - ${epTitle}` : ''}${ext}`;
  const destFileName = sanitize(file);
  return { destDir, destFileName, destPath: path.join(destDir, destFileName) };
}

export function planDestination(d: MediaDescriptor, root: string, opts: PlanOptions): PlannedDestination {
  return d.kind === 'movie' ? movieOutputPath(d, root, opts) : episodeOutputPath(d, root, opts);
}
