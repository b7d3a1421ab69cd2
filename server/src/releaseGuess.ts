import path from 'path';
import { log } from './logging.js';
import { normalizeSeparators } from './parse.js';
import type { TitleGuess, TitleGuesser } from './types.js';

// Heuristic release-name parser. It strips scene noise, looks for the usual
// episode markers and reports what it found; the classifier decides what to
// do with it.

const YEAR_RE = /\b(19\d{2}|20\d{2})\b/;
const SXXEXX_ALL = /\bS(\d{1,2})E(\d{2,3})(?:E(\d{2,3}))*\b/ig;
const SXXEXX = /\bS(\d{1,2})E(\d{1,3})\b/i;
const XXxYY = /\b(\d{1,2})x(\d{2,3})\b/i;
const EP_RANGE = /\bE(\d{1,3})-(\d{1,3})\b/i;
const E_ONLY = /\bE(\d{1,3})\b/i;
const EPISODE_WORD = /\bEpisode\s*(\d{1,3})\b/i;

// Where the episode marker starts; the title sits before it, the episode title after
const MARKER = /\bS\d{1,2}E\d{1,3}(?:E\d{2,3})*\b|\bE\d{1,3}(?:-\d{1,3})?\b|\bEpisode\s*\d{1,3}\b|\b\d{1,2}x\d{2,3}\b/i;

// Scene tags that never belong in a title
const RESOLUTION = ['480p', '720p', '1080p', '2160p', '4k'];
const CODEC = ['x\\.?26[45]', 'h\\.?26[45]', 'hevc', 'avc', 'aac(?:2\\.?0)?', 'ac3'];
const SOURCE = ['Blu-?ray', 'BDRip', 'WEB[-_.]?(?:DL|Rip)', 'WEB', 'HDTV', 'DVDRip', 'HDRip', 'BRRip', 'CAM', 'SCR'];
const FLAGS = ['UNCENSORED', 'UNCUT', 'DUAL', 'ENG', 'JPN', 'SUB(?:BED)?', 'DUBBED', 'PROPER', 'REPACK'];
const SCENE_TAG = new RegExp(`\\b(?:${[...RESOLUTION, ...CODEC, ...SOURCE, ...FLAGS].join('|')})\\b`, 'gi');

// Bracketed group names, and parentheses unless they hold a year
const BRACKETED = /\[[^\]]*\]|\{[^}]*\}|\((?!(?:19|20)\d{2}\))[^)]*\)/g;

function scrub(s: string) {
  return normalizeSeparators(s.replace(BRACKETED, ' ').replace(SCENE_TAG, ' ').replace(/-+/g, ' '));
}

function pickTitleCandidate(base: string) {
  const cleaned = scrub(base);
  const idx = cleaned.search(MARKER);
  if (idx >= 0) {
    const cand = cleaned.slice(0, idx).replace(YEAR_RE, '').trim();
    if (cand.length >= 2) return cand;
  }
  if (idx < 0 && cleaned.length >= 2) return cleaned.replace(YEAR_RE, '').trim() || cleaned;
  return '';
}

function episodesFrom(base: string): { season?: number; episodes?: number[] } {
  const all = [...base.matchAll(SXXEXX_ALL)];
  if (all.length) {
    const eps: number[] = [];
    for (const a of all) {
      for (const e of a[0].matchAll(/E(\d{2,3})/ig)) eps.push(Number(e[1]));
    }
    return { season: Number(all[0][1]), episodes: eps };
  }

  const range = EP_RANGE.exec(base);
  if (range) {
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (end >= start) {
      const eps: number[] = [];
      for (let i = start; i <= end; i++) eps.push(i);
      return { episodes: eps };
    }
  }

  const xy = XXxYY.exec(base) ?? SXXEXX.exec(base);
  if (xy) return { season: Number(xy[1]), episodes: [Number(xy[2])] };

  const single = E_ONLY.exec(base) ?? EPISODE_WORD.exec(base);
  if (single) return { episodes: [Number(single[1])] };
  return {};
}

export function guessReleaseName(fileName: string): TitleGuess | null {
  const ext = path.extname(fileName || '');
  const base = path.basename(fileName || '', ext);
  const spaced = normalizeSeparators(base);

  const title = pickTitleCandidate(base);
  const { season, episodes } = episodesFrom(spaced);
  const yearMatch = YEAR_RE.exec(scrub(base));

  if (!title && !episodes) return null;

  const guess: TitleGuess = { kind: episodes ? 'episode' : 'movie' };
  if (title) guess.title = title;
  if (season !== undefined) guess.season = season;
  if (episodes) guess.episodes = episodes;
  if (yearMatch) guess.year = Number(yearMatch[1]);
  if (ext) guess.container = ext.slice(1).toLowerCase();

  if (episodes) {
    const m = MARKER.exec(spaced);
    if (m) {
      const after = scrub(spaced.slice(m.index + m[0].length))
        .replace(/^[-:\s]+/, '')
        .replace(/[-_.\s:;]+$/g, '')
        .trim();
      if (after) guess.episodeTitle = after;
    }
  }

  log('debug', `guessReleaseName: ${fileName} -> ${JSON.stringify(guess)}`);
  return guess;
}

export class ReleaseNameGuesser implements TitleGuesser {
  readonly name = 'release-name';

  isAvailable() {
    return true;
  }

  async guess(fileName: string) {
    return guessReleaseName(fileName);
  }
}
