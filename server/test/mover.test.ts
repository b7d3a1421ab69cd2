import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { applyMoves, computeBatchBytes, listCompanionFiles, type RenameFn } from '../src/mover.js';
import { toMediaItem } from '../src/scan.js';
import type { MediaItem, MoveProgress } from '../src/types.js';

const COMPANIONS = ['.srt', '.nfo'];

let tmp: string;
let src: string;
let dest: string;

function write(rel: string, content: string) {
  const p = path.join(src, rel);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content);
  return p;
}

function episodeItem(sourcePath: string): MediaItem {
  return toMediaItem(
    sourcePath,
    { kind: 'series', rule: 'series-leading-title', showTitle: 'Cheers', season: 4, episodes: [5], episodeTitle: 'Tortilla', extension: '.mkv' },
    dest,
    '.mkv',
  );
}

function movieItem(sourcePath: string, title: string): MediaItem {
  return toMediaItem(sourcePath, { kind: 'movie', rule: 'fallback-movie', title, extension: '.mkv' }, dest, '.mkv');
}

const crossDevice: RenameFn = async () => {
  throw Object.assign(new Error('cross-device link not permitted'), { code: 'EXDEV' });
};

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'relocator-move-'));
  src = path.join(tmp, 'src');
  dest = path.join(tmp, 'dest');
  fs.mkdirSync(src);
  fs.mkdirSync(dest);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('listCompanionFiles', () => {
  it('matches the exact stem and a companion extension', async () => {
    const video = write('show/Ep.mkv', 'v');
    write('show/Ep.srt', 's');
    write('show/Ep.NFO', 'n');
    write('show/Ep.en.srt', 'x');
    write('show/Ep.txt', 'x');
    write('show/Other.srt', 'x');
    expect(await listCompanionFiles(video, COMPANIONS)).toEqual([
      path.join(src, 'show', 'Ep.NFO'),
      path.join(src, 'show', 'Ep.srt'),
    ]);
  });
});

describe('applyMoves', () => {
  it('renames on the same volume and carries companions', async () => {
    const video = write('Cheers/Cheers_04x05-Tortilla.mkv', '0123456789');
    write('Cheers/Cheers_04x05-Tortilla.srt', 'subs');
    const item = episodeItem(video);

    const errors = await applyMoves([item], { companionExtensions: COMPANIONS });

    expect(errors).toEqual([]);
    expect(fs.existsSync(video)).toBe(false);
    expect(fs.readFileSync(item.destPath, 'utf8')).toBe('0123456789');
    expect(fs.readFileSync(path.join(item.destDir, 'Cheers - 04x05 - Tortilla.srt'), 'utf8')).toBe('subs');
  });

  it('copies in chunks with exact progress across volumes', async () => {
    const video = write('Cheers/Cheers_04x05-Tortilla.mkv', '0123456789');
    const item = episodeItem(video);
    const events: MoveProgress[] = [];

    const errors = await applyMoves([item], { companionExtensions: COMPANIONS, chunkSize: 4, rename: crossDevice }, p => events.push(p));

    expect(errors).toEqual([]);
    expect(events.map(e => e.bytes)).toEqual([4, 4, 2]);
    expect(events.map(e => e.done)).toEqual([4, 8, 10]);
    expect(events.every(e => e.total === 10 && e.label === 'Cheers - 04x05 - Tortilla.mkv')).toBe(true);
    expect(events.reduce((n, e) => n + e.bytes, 0)).toBe(fs.statSync(item.destPath).size);
    expect(fs.existsSync(video)).toBe(false);
    expect(fs.readFileSync(item.destPath, 'utf8')).toBe('0123456789');
  });

  it('keeps the modification time when copying across volumes', async () => {
    const video = write('m/old.mkv', 'abc');
    fs.utimesSync(video, 978307200, 978307200);
    const item = movieItem(video, 'Old');

    expect(await applyMoves([item], { companionExtensions: COMPANIONS, rename: crossDevice })).toEqual([]);
    expect(fs.statSync(item.destPath).mtime.getTime()).toBe(978307200000);
  });

  it('removes a partial copy and keeps the source when the copy fails', async () => {
    const video = write('m/big.mkv', '0123456789');
    const item = movieItem(video, 'Big');
    const realOpen = fs.promises.open;
    vi.spyOn(fs.promises, 'open').mockImplementation(async (file, flags, mode) => {
      const handle = await realOpen(file, flags, mode);
      if (flags === 'w') vi.spyOn(handle, 'write').mockRejectedValueOnce(new Error('no space left on device'));
      return handle;
    });

    const errors = await applyMoves([item], { companionExtensions: COMPANIONS, chunkSize: 4, rename: crossDevice });

    expect(errors).toEqual([{ kind: 'move-error', path: video, target: item.destPath, cause: 'no space left on device' }]);
    expect(fs.existsSync(item.destPath)).toBe(false);
    expect(fs.readFileSync(video, 'utf8')).toBe('0123456789');
  });

  it('counts companions in the total', async () => {
    const video = write('m/clip.mkv', 'abcdef');
    write('m/clip.nfo', 'nfo');
    expect(await computeBatchBytes([movieItem(video, 'Clip')], COMPANIONS)).toBe(9);

    const events: MoveProgress[] = [];
    await applyMoves([movieItem(video, 'Clip')], { companionExtensions: COMPANIONS, chunkSize: 4, rename: crossDevice }, p => events.push(p));
    expect(events.map(e => [e.label, e.done])).toEqual([
      ['Clip.mkv', 4],
      ['Clip.mkv', 6],
      ['Clip.nfo', 9],
    ]);
  });

  it('records a failed rename and keeps going', async () => {
    const first = write('a/first.mkv', 'one');
    write('a/first.srt', 'subs');
    const second = write('b/second.mkv', 'two');
    const failing: RenameFn = async (from, to) => {
      if (from === first) throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
      await fs.promises.rename(from, to);
    };
    const items = [movieItem(first, 'First'), movieItem(second, 'Second')];

    const errors = await applyMoves(items, { companionExtensions: COMPANIONS, rename: failing });

    expect(errors).toEqual([{ kind: 'move-error', path: first, target: items[0].destPath, cause: 'permission denied' }]);
    expect(fs.existsSync(first)).toBe(true);
    expect(fs.existsSync(path.join(src, 'a', 'first.srt'))).toBe(true);
    expect(fs.readFileSync(items[1].destPath, 'utf8')).toBe('two');
  });

  it('reports a missing source as an error', async () => {
    const item = movieItem(path.join(src, 'ghost.mkv'), 'Ghost');
    const errors = await applyMoves([item], { companionExtensions: COMPANIONS });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ kind: 'move-error', path: item.sourcePath, target: item.destPath });
  });

  it('overwrites an existing destination', async () => {
    const video = write('m/new.mkv', 'fresh');
    const item = movieItem(video, 'Film');
    fs.mkdirSync(item.destDir, { recursive: true });
    fs.writeFileSync(item.destPath, 'stale content');

    expect(await applyMoves([item], { companionExtensions: COMPANIONS })).toEqual([]);
    expect(fs.readFileSync(item.destPath, 'utf8')).toBe('fresh');
  });

  it('leaves a file already in place alone but reports its bytes', async () => {
    const item = movieItem(path.join(dest, 'Movies', 'Film.mkv'), 'Film');
    fs.mkdirSync(item.destDir, { recursive: true });
    fs.writeFileSync(item.sourcePath, 'abc');
    const listener = vi.fn();

    expect(await applyMoves([item], { companionExtensions: COMPANIONS }, listener)).toEqual([]);
    expect(listener).toHaveBeenCalledWith({ bytes: 3, done: 3, total: 3, label: 'Film.mkv' });
    expect(fs.readFileSync(item.destPath, 'utf8')).toBe('abc');
  });

  it('survives a throwing progress listener', async () => {
    const video = write('m/clip.mkv', 'abc');
    const item = movieItem(video, 'Clip');
    const errors = await applyMoves([item], { companionExtensions: COMPANIONS }, () => {
      throw new Error('listener broke');
    });
    expect(errors).toEqual([]);
    expect(fs.existsSync(item.destPath)).toBe(true);
  });
});
