export type MediaType = 'movie' | 'series';

export type ClassificationRule =
  | 'numbered-franchise'
  | 'series-leading-title'
  | 'series-anywhere'
  | 'guesser-primary'
  | 'guesser-fallback'
  | 'fallback-movie';

export interface MovieDescriptor {
  kind: 'movie';
  rule: ClassificationRule;
  title: string;
  year?: number;
  /** Source extension including the dot, or '' when the file has none */
  extension: string;
}

export interface SeriesDescriptor {
  kind: 'series';
  rule: ClassificationRule;
  showTitle: string;
  season: number;
  episodes: number[];
  episodeTitle: string;
  extension: string;
}

export type MediaDescriptor = MovieDescriptor | SeriesDescriptor;

interface PlannedPaths {
  readonly sourcePath: string;
  readonly rule: ClassificationRule;
  readonly destFileName: string;
  readonly destDir: string;
  readonly destPath: string;
}

export interface MovieItem extends PlannedPaths {
  readonly contentType: 'movie';
}

export interface SeriesItem extends PlannedPaths {
  readonly contentType: 'series';
  readonly showTitle: string;
  readonly season: number;
  readonly episodes: readonly number[];
}

export type MediaItem = MovieItem | SeriesItem;

/**
 * What an external title guesser reports about a file name. Every field is
 * optional; a guesser with nothing to say returns null instead.
 */
export interface TitleGuess {
  kind?: 'episode' | 'movie';
  title?: string;
  season?: number;
  episodes?: number[];
  year?: number;
  episodeTitle?: string;
  container?: string;
}

export interface TitleGuesser {
  readonly name: string;
  isAvailable(): boolean;
  guess(fileName: string): Promise<TitleGuess | null>;
  close?(): void;
}

export interface MoveProgress {
  /** Bytes added by this increment */
  bytes: number;
  done: number;
  total: number;
  /** Destination file name currently being moved */
  label: string;
}

export type ProgressListener = (progress: MoveProgress) => void;
