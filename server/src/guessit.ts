import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { log } from './logging.js';
import { describeError } from './errors.js';
import type { TitleGuess, TitleGuesser } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const REQUEST_TIMEOUT_MS = 5000;

export interface GuessitOptions {
  enabled: boolean;
  /** Path to guessit_server.py; discovered next to the server when omitted */
  scriptPath?: string;
  pythonCommand: string;
  timeoutMs?: number;
}

type Reply = { result?: unknown; error?: string };

export function findGuessitScript(explicit?: string) {
  // Cope with the server being launched from the repo root, from server/, or from dist/
  const candidates = [
    explicit,
    path.resolve(process.cwd(), 'server', 'guessit_server.py'),
    path.resolve(process.cwd(), 'guessit_server.py'),
    path.resolve(__dirname, '..', 'guessit_server.py'),
    path.resolve(__dirname, '..', '..', '..', 'server', 'guessit_server.py'),
  ];
  for (const c of candidates) {
    if (c && fs.existsSync(c)) return c;
  }
  return null;
}

function asRecord(v: unknown): Record<string, unknown> | null {
  return v && typeof v === 'object' && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : null;
}

function positiveInt(v: unknown): number | undefined {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? parseInt(v, 10) : NaN;
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/**
 * Turn a raw guessit dictionary into a TitleGuess. Unknown shapes produce
 * null, never an exception.
 */
export function normalizeGuessitResult(raw: unknown): TitleGuess | null {
  const r = asRecord(raw);
  if (!r) return null;
  const guess: TitleGuess = {};
  if (r.type === 'episode' || r.type === 'movie') guess.kind = r.type;
  if (typeof r.title === 'string' && r.title.trim()) guess.title = r.title.trim();

  const season = positiveInt(Array.isArray(r.season) ? r.season[0] : r.season);
  if (season !== undefined) guess.season = season;

  const listed = Array.isArray(r.episode_list) ? r.episode_list : Array.isArray(r.episode) ? r.episode : [r.episode];
  const episodes = listed.map(positiveInt).filter((e): e is number => e !== undefined);
  if (episodes.length) guess.episodes = episodes;

  const year = positiveInt(r.year);
  if (year !== undefined) guess.year = year;
  if (typeof r.episode_title === 'string' && r.episode_title.trim()) guess.episodeTitle = r.episode_title.trim();
  if (typeof r.container === 'string') guess.container = r.container;

  return Object.keys(guess).length ? guess : null;
}

export class GuessitGuesser implements TitleGuesser {
  readonly name = 'guessit';
  private proc: ChildProcessWithoutNullStreams | null = null;
  private buffer = '';
  private readonly pending = new Map<string, (reply: Reply) => void>();
  private failed = false;
  private readonly script: string | null;
  private seq = 0;

  constructor(private readonly opts: GuessitOptions) {
    this.script = opts.enabled ? findGuessitScript(opts.scriptPath) : null;
    if (opts.enabled && !this.script) log('warn', 'guessit script not found; guessit parsing disabled');
  }

  isAvailable() {
    return this.opts.enabled && !!this.script && !this.failed;
  }

  async guess(fileName: string): Promise<TitleGuess | null> {
    const proc = this.ensureProc();
    if (!proc) return null;
    const id = `${Date.now().toString(36)}-${(this.seq++).toString(36)}`;
    const reply = await new Promise<Reply>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) resolve({ error: 'timeout' });
      }, this.opts.timeoutMs ?? REQUEST_TIMEOUT_MS);
      this.pending.set(id, (r) => {
        clearTimeout(timer);
        resolve(r);
      });
      proc.stdin.write(JSON.stringify({ id, path: fileName }) + '\n');
    });
    if (reply.error) {
      log('debug', `guessit gave no answer for ${fileName}: ${reply.error}`);
      return null;
    }
    return normalizeGuessitResult(reply.result);
  }

  close() {
    if (this.proc) this.proc.kill();
    this.proc = null;
  }

  private ensureProc() {
    if (this.proc && !this.proc.killed) return this.proc;
    if (!this.isAvailable() || !this.script) return null;
    const proc = spawn(this.opts.pythonCommand, [this.script]);
    this.proc = proc;
    proc.stdout.setEncoding('utf8');
    proc.stdout.on('data', (chunk: string) => this.onData(chunk));
    proc.stderr.setEncoding('utf8');
    proc.stderr.on('data', (c: string) => log('debug', `[guessit stderr] ${c.trim()}`));
    proc.on('exit', (code) => {
      log('info', `guessit child exited (code=${code ?? 'signal'})`);
      if (code !== 0 && code !== null) this.failed = true;
      this.proc = null;
      this.buffer = '';
      for (const [, cb] of this.pending) cb({ error: 'child_exited' });
      this.pending.clear();
    });
    proc.on('error', (err) => {
      log('warn', `guessit process error: ${describeError(err)}`);
      this.failed = true;
    });
    // A missing interpreter surfaces as an EPIPE on stdin
    proc.stdin.on('error', (err) => log('debug', `guessit stdin: ${describeError(err)}`));
    return proc;
  }

  private onData(chunk: string) {
    this.buffer += chunk;
    let idx: number;
    while ((idx = this.buffer.indexOf('\n')) >= 0) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + 1);
      if (!line) continue;
      let msg: Record<string, unknown> | null;
      try {
        msg = asRecord(JSON.parse(line));
      } catch (e) {
        log('debug', `[guessit stdout] unparsable line: ${line}`);
        continue;
      }
      const id = msg && typeof msg.id === 'string' ? msg.id : undefined;
      const cb = id ? this.pending.get(id) : undefined;
      if (!msg || !id || !cb) continue;
      this.pending.delete(id);
      cb({ result: msg.result, error: typeof msg.error === 'string' ? msg.error : undefined });
    }
  }
}
