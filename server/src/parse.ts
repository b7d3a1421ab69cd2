import path from 'path';
import { log } from './logging.js';
import { sanitize } from './renamer.js';
import { describeError } from './errors.js';
import type {
  ClassificationRule,
  MediaDescriptor,
  MovieDescriptor,
  SeriesDescriptor,
  TitleGuess,
  TitleGuesser,
} from './types.js';

// Classification runs an ordered chain of local heuristics, then up to two
// optional guessers, then falls back to a movie named after the cleaned stem.
// The first rule that matches decides.

const UNKNOWN_SHOW = 'Unknown';
const UNKNOWN_MOVIE = 'Unknown Movie';

const TRAILING_TAG = /\s*(?:\[[^\]]*\]|\([^)]*\))\s*$/;

// "Franchise NN - Title"
const NUMBERED_FRANCHISE = /^\s*(.+?)\s+(\d{1,3})\s*[-–—]\s*([^[(]+?)\s*(?:\[[^\]]*\]|\([^)]*\))*\s*$/i;

// "<title> S01E02 ..." and "<title> 1x02 ..." anchored at the start
const SERIES_WITH_TITLE: readonly RegExp[] = [
  /^\s*(.+?)[\s._-]*(?<![A-Za-z0-9])S(\d{1,2})E(\d{1,3})\b/i,
  /^\s*(.+?)[\s._-]*(?<![A-Za-z0-9])(\d{1,2})x(\d{1,3})\b/i,
];

// The same tokens anywhere, as a whole token: `720p` or `S01E01E02` do not count
const ANY_SXXEYY = /(?:^|[^A-Za-z0-9])S(\d{1,2})E(\d{1,3})(?:[^A-Za-z0-9]|$)/i;
const ANY_NXM = /(?:^|[^A-Za-z0-9])(\d{1,2})x(\d{1,3})(?:[^A-Za-z0-9]|$)/i;

const PARENT_SEASON_CLAUSE = /^(.+?)\s*-\s*Temporada\b/i;
const PARENT_JUNK = /\b(Temporada|Completa|DVDRip|HDTV|WEB[- ]?DL|BluRay)\b.*$/i;

/** Strip trailing `[...]` and `(...)` tags until none are left. */
export function stripReleaseTags(stem: string) {
  let s = stem;
  for (;;) {
    const next = s.replace(TRAILING_TAG, '');
    if (next === s) break;
    s = next;
  }
  s = s.replace(/\s*[–—]\s*/g, ' - ');
  return s.replace(/\s+/g, ' ').replace(/^[\s-]+|[\s-]+$/g, '');
}

export function normalizeSeparators(s: string) {
  return s.replace(/[._]+/g, ' ').replace(/\s{2,}/g, ' ').trim();
}

function beautify(s: string) {
  return s
    .replace(/[_.]/g, ' ')
    .replace(/\s*[-–—]\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** First run of digits in `v`; anything missing, unparsable or below 1 becomes `fallback`. */
export function safeInt(v: unknown, fallback = 1) {
  const m = /\d+/.exec(String(v ?? ''));
  const n = m ? parseInt(m[0], 10) : NaN;
  return n > 0 ? n : fallback;
}

export function cleanEpisodeTitle(raw: string) {
  let s = raw || '';
  s = s.replace(/^[\s.\-_:–—]+/, '');
  s = s.replace(/^(S?\s*\d{1,2}\s*[xE]\s*\d{1,3})(?:\s*[-_.])?\s*/i, '');
  s = s.replace(/\s*(?:[-_.])?\s*(S?\s*\d{1,2}\s*[xE]\s*\d{1,3})\s*$/i, '');
  s = stripReleaseTags(s);
  return beautify(s);
}

/**
 * Show name from a folder such as "Cheers - Temporada 4 [DVDRip]" or
 * "The Wire Completa HDTV". Returns '' when nothing usable is left.
 */
export function guessShowFromParentDir(parentDirName: string) {
  let parent = beautify(stripReleaseTags(parentDirName || ''));
  const m = PARENT_SEASON_CLAUSE.exec(parent);
  if (m) return sanitize(beautify(m[1]));
  parent = parent.replace(PARENT_JUNK, '').replace(/^[\s-]+|[\s-]+$/g, '');
  return parent ? sanitize(parent) : '';
}

function episodeTitleAfter(cleaned: string, m: RegExpExecArray) {
  return cleanEpisodeTitle(cleaned.slice(m.index + m[0].length));
}

function episodeTitleFromLocalToken(cleaned: string) {
  const m = ANY_SXXEYY.exec(cleaned) ?? ANY_NXM.exec(cleaned);
  return m ? episodeTitleAfter(cleaned, m) : '';
}

export interface ClassifierOptions {
  /** Capability A: consulted for season/episode fields only */
  primaryGuesser?: TitleGuesser;
  /** Capability B: may classify as episode or movie */
  fallbackGuesser?: TitleGuesser;
}

export class Classifier {
  constructor(private readonly opts: ClassifierOptions = {}) {}

  async classify(fileBaseName: string, parentDirName: string): Promise<MediaDescriptor> {
    const extension = path.extname(fileBaseName);
    const stem = path.basename(fileBaseName, extension);
    const cleaned = normalizeSeparators(stripReleaseTags(stem));
    const parentTitle = () => guessShowFromParentDir(parentDirName);

    const result = await this.runChain(fileBaseName, cleaned, extension, parentTitle);
    log('debug', `classify: ${fileBaseName} [${parentDirName}] -> ${JSON.stringify(result)}`);
    return result;
  }

  private async runChain(
    fileBaseName: string,
    cleaned: string,
    extension: string,
    parentTitle: () => string,
  ): Promise<MediaDescriptor> {
    const franchise = NUMBERED_FRANCHISE.exec(cleaned);
    if (franchise) {
      const num = safeInt(franchise[2]);
      const title = sanitize(`${beautify(franchise[1])} ${String(num).padStart(2, '0')} - ${beautify(franchise[3])}`);
      return { kind: 'movie', rule: 'numbered-franchise', title, extension };
    }

    for (const rx of SERIES_WITH_TITLE) {
      const m = rx.exec(cleaned);
      if (!m) continue;
      const rawTitle = m[1].split(/\bTemporada\b/i)[0];
      return {
        kind: 'series',
        rule: 'series-leading-title',
        showTitle: sanitize(beautify(rawTitle)) || parentTitle() || UNKNOWN_SHOW,
        season: safeInt(m[2]),
        episodes: [safeInt(m[3])],
        episodeTitle: episodeTitleAfter(cleaned, m),
        extension,
      };
    }

    for (const rx of [ANY_SXXEYY, ANY_NXM]) {
      const m = rx.exec(cleaned);
      if (!m) continue;
      const prefix = cleaned.slice(0, m.index).replace(/[\s._-]+$/, '');
      return {
        kind: 'series',
        rule: 'series-anywhere',
        showTitle: sanitize(beautify(prefix)) || parentTitle() || UNKNOWN_SHOW,
        season: safeInt(m[1]),
        episodes: [safeInt(m[2])],
        episodeTitle: episodeTitleAfter(cleaned, m),
        extension,
      };
    }

    const primary = await consult(this.opts.primaryGuesser, fileBaseName);
    if (primary && (primary.season !== undefined || (primary.episodes && primary.episodes.length > 0))) {
      return seriesFromGuess(primary, 'guesser-primary', cleaned, extension, parentTitle);
    }

    const fallback = await consult(this.opts.fallbackGuesser, fileBaseName);
    if (fallback?.kind === 'episode') {
      return seriesFromGuess(fallback, 'guesser-fallback', cleaned, extension, parentTitle);
    }
    if (fallback?.kind === 'movie') {
      const movie: MovieDescriptor = {
        kind: 'movie',
        rule: 'guesser-fallback',
        title: sanitize(beautify(fallback.title || cleaned)) || UNKNOWN_MOVIE,
        extension,
      };
      if (fallback.year && fallback.year > 0) movie.year = fallback.year;
      return movie;
    }

    return {
      kind: 'movie',
      rule: 'fallback-movie',
      title: sanitize(beautify(cleaned)) || UNKNOWN_MOVIE,
      extension,
    };
  }
}

async function consult(guesser: TitleGuesser | undefined, fileName: string): Promise<TitleGuess | null> {
  if (!guesser || !guesser.isAvailable()) return null;
  try {
    return await guesser.guess(fileName);
  } catch (e) {
    log('debug', `${guesser.name} had no opinion on ${fileName}: ${describeError(e)}`);
    return null;
  }
}

function seriesFromGuess(
  guess: TitleGuess,
  rule: ClassificationRule,
  cleaned: string,
  extension: string,
  parentTitle: () => string,
): SeriesDescriptor {
  let title = guess.title || cleaned || UNKNOWN_SHOW;
  for (const rx of SERIES_WITH_TITLE) {
    const m = rx.exec(title);
    if (m) {
      title = m[1];
      break;
    }
  }
  const episodes = (guess.episodes ?? []).map(e => safeInt(e, 0)).filter(e => e > 0);
  return {
    kind: 'series',
    rule,
    showTitle: sanitize(beautify(title)) || parentTitle() || UNKNOWN_SHOW,
    season: safeInt(guess.season),
    episodes: episodes.length ? episodes : [1],
    episodeTitle: cleanEpisodeTitle(guess.episodeTitle ?? '') || episodeTitleFromLocalToken(cleaned),
    extension,
  };
}
