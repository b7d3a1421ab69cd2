import path from 'path';
import { describe, expect, it } from 'vitest';
import { episodeLabel, episodeOutputPath, movieOutputPath, sanitize } from '../src/renamer.js';

const root = path.resolve('/library');

describe('sanitize', () => {
  it('replaces forbidden characters', () => {
    expect(sanitize('a<b>c:d"e/f\\g|h?i*j')).toBe('a_b_c_d_e_f_g_h_i_j');
    expect(sanitize('tab\u0001here')).toBe('tab_here');
  });

  it('collapses whitespace', () => {
    expect(sanitize('  The   Wire  ')).toBe('The Wire');
  });

  it('prefixes reserved device names', () => {
    expect(sanitize('CON')).toBe('_CON');
    expect(sanitize('lpt1.txt')).toBe('_lpt1.txt');
    expect(sanitize('Console')).toBe('Console');
  });
});

describe('episodeLabel', () => {
  it('pads to two digits', () => {
    expect(episodeLabel(4, [5])).toBe('04x05');
    expect(episodeLabel(12, [103])).toBe('12x103');
  });

  it('renders a range for multi-episode files', () => {
    expect(episodeLabel(1, [1, 2, 3])).toBe('01x01-03');
  });
});

describe('output paths', () => {
  it('adds the year to movies', () => {
    const out = movieOutputPath({ kind: 'movie', rule: 'guesser-fallback', title: 'Heat', year: 1995, extension: '.mkv' }, root, { defaultExtension: '.mkv' });
    expect(out).toEqual({
      destDir: path.join(root, 'Movies'),
      destFileName: 'Heat (1995).mkv',
      destPath: path.join(root, 'Movies', 'Heat (1995).mkv'),
    });
  });

  it('uses the default extension when the source has none', () => {
    const out = movieOutputPath({ kind: 'movie', rule: 'fallback-movie', title: 'Clip', extension: '' }, root, { defaultExtension: 'mp4' });
    expect(out.destFileName).toBe('Clip.mp4');
  });

  it('sanitizes every segment of an episode path', () => {
    const out = episodeOutputPath(
      { kind: 'series', rule: 'series-anywhere', showTitle: 'Who?', season: 3, episodes: [9], episodeTitle: 'Pilot: Part 1', extension: '.avi' },
      root,
      { defaultExtension: '.mkv' },
    );
    expect(out.destDir).toBe(path.join(root, 'Series', 'Who_', 'Season 03'));
    expect(out.destFileName).toBe('Who_ - 03x09 - Pilot_ Part 1.avi');
  });

  it('omits an empty episode title', () => {
    const out = episodeOutputPath(
      { kind: 'series', rule: 'guesser-primary', showTitle: 'Show', season: 1, episodes: [1, 2], episodeTitle: '', extension: '.mkv' },
      root,
      { defaultExtension: '.mkv' },
    );
    expect(out.destFileName).toBe('Show - 01x01-02.mkv');
  });
});
