import fs from 'fs';
import path from 'path';
import { ConfigError, describeError } from './errors.js';
import { isLogLevel, type LogLevel } from './logging.js';

export interface GuesserConfig {
  releaseName: boolean;
  guessit: boolean;
  guessitScript?: string;
  pythonCommand: string;
}

export interface AppConfig {
  sourceRoots: string[];
  destinationRoot: string;
  videoExtensions: string[];
  companionExtensions: string[];
  samplePattern: string;
  hiddenMarker: string;
  defaultExtension: string;
  chunkSize: number;
  guessers: GuesserConfig;
  host: string;
  port: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  sourceRoots: [],
  destinationRoot: '',
  videoExtensions: ['.avi', '.mkv', '.mp4', '.mov', '.wmv', '.flv'],
  companionExtensions: ['.srt', '.sub', '.idx', '.nfo', '.jpg', '.jpeg', '.png', '.txt'],
  samplePattern: String.raw`(sample|trailer|\b(rarbg|yts|ettv|eztv)\b)`,
  hiddenMarker: '.',
  defaultExtension: '.mkv',
  chunkSize: 1024 * 1024,
  guessers: { releaseName: true, guessit: false, pythonCommand: 'python3' },
  host: '0.0.0.0',
  port: 8080,
  logLevel: 'info',
};

export function configPath() {
  return process.env.CONFIG_PATH || path.resolve(process.cwd(), 'config', 'config.json');
}

/**
 * Accept both Windows and POSIX style paths submitted from a UI or a config
 * file written on another machine. Drive letters map to `/mnt/<drive>` on
 * POSIX hosts.
 */
export function normalizeForHost(p: string, platform: NodeJS.Platform = process.platform) {
  const raw = String(p).trim();
  if (!raw) return raw;
  if (platform === 'win32') return path.win32.resolve(raw);
  const s = raw.replace(/\\+/g, '/').replace(/\/{2,}/g, '/');
  const drive = /^([A-Za-z]):(?:\/(.*))?$/.exec(s);
  if (drive) return path.posix.join('/mnt', drive[1].toLowerCase(), drive[2] ?? '');
  return path.posix.resolve(s);
}

export function normalizeExtensions(exts: readonly string[]) {
  const out: string[] = [];
  for (const e of exts) {
    const t = e.trim().toLowerCase();
    if (!t) continue;
    const dotted = t.startsWith('.') ? t : `.${t}`;
    if (!out.includes(dotted)) out.push(dotted);
  }
  return out;
}

function stringList(v: unknown, field: string): string[] | undefined {
  if (v === undefined) return undefined;
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string')) {
    throw new ConfigError(`${field} must be a list of strings`);
  }
  return v;
}

function str(v: unknown, field: string): string | undefined {
  if (v === undefined) return undefined;
  if (typeof v !== 'string') throw new ConfigError(`${field} must be a string`);
  return v;
}

function bool(v: unknown, field: string): boolean | undefined {
  if (v === undefined) return undefined;
  if (typeof v !== 'boolean') throw new ConfigError(`${field} must be true or false`);
  return v;
}

function int(v: unknown, field: string): number | undefined {
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isInteger(v) || v <= 0) {
    throw new ConfigError(`${field} must be a positive integer`);
  }
  return v;
}

function record(v: unknown, field: string): Record<string, unknown> {
  if (v === undefined) return {};
  if (!v || typeof v !== 'object' || Array.isArray(v)) throw new ConfigError(`${field} must be an object`);
  return Object.fromEntries(Object.entries(v));
}

export function compileSamplePattern(pattern: string) {
  try {
    return new RegExp(pattern, 'i');
  } catch (e) {
    throw new ConfigError(`samplePattern is not a valid regular expression: ${describeError(e)}`);
  }
}

/** Validate a parsed config document, filling gaps from `base`. */
export function normalizeConfig(raw: unknown, base: Readonly<AppConfig> = DEFAULT_CONFIG): AppConfig {
  const r = record(raw, 'config');
  const g = record(r.guessers, 'guessers');
  const logLevel = str(r.logLevel, 'logLevel');
  if (logLevel !== undefined && !isLogLevel(logLevel)) throw new ConfigError(`logLevel must be one of info, warn, error, debug`);

  const sourceRoots = stringList(r.sourceRoots, 'sourceRoots') ?? base.sourceRoots;
  const destinationRoot = str(r.destinationRoot, 'destinationRoot') ?? base.destinationRoot;
  const samplePattern = str(r.samplePattern, 'samplePattern') ?? base.samplePattern;
  compileSamplePattern(samplePattern);

  const guessitScript = str(g.guessitScript, 'guessers.guessitScript') ?? base.guessers.guessitScript;
  const cfg: AppConfig = {
    sourceRoots: Array.from(new Set(sourceRoots.map(s => normalizeForHost(s)).filter(Boolean))),
    destinationRoot: destinationRoot ? normalizeForHost(destinationRoot) : '',
    videoExtensions: normalizeExtensions(stringList(r.videoExtensions, 'videoExtensions') ?? base.videoExtensions),
    companionExtensions: normalizeExtensions(stringList(r.companionExtensions, 'companionExtensions') ?? base.companionExtensions),
    samplePattern,
    hiddenMarker: str(r.hiddenMarker, 'hiddenMarker') ?? base.hiddenMarker,
    defaultExtension: normalizeExtensions([str(r.defaultExtension, 'defaultExtension') ?? base.defaultExtension])[0] ?? '',
    chunkSize: int(r.chunkSize, 'chunkSize') ?? base.chunkSize,
    guessers: {
      releaseName: bool(g.releaseName, 'guessers.releaseName') ?? base.guessers.releaseName,
      guessit: bool(g.guessit, 'guessers.guessit') ?? base.guessers.guessit,
      pythonCommand: str(g.pythonCommand, 'guessers.pythonCommand') ?? base.guessers.pythonCommand,
    },
    host: str(r.host, 'host') ?? base.host,
    port: int(r.port, 'port') ?? base.port,
    logLevel: logLevel ?? base.logLevel,
  };
  if (guessitScript) cfg.guessers.guessitScript = guessitScript;
  if (!cfg.hiddenMarker) throw new ConfigError('hiddenMarker must not be empty');
  return cfg;
}

/** Environment overrides win over the config file. */
export function applyEnv(cfg: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const next: AppConfig = { ...cfg, guessers: { ...cfg.guessers } };
  if (env.SOURCE_ROOTS) {
    next.sourceRoots = env.SOURCE_ROOTS.split(path.delimiter).map(s => normalizeForHost(s)).filter(Boolean);
  }
  if (env.DESTINATION_ROOT) next.destinationRoot = normalizeForHost(env.DESTINATION_ROOT);
  if (env.GUESSIT_ENABLED) next.guessers.guessit = env.GUESSIT_ENABLED === '1' || env.GUESSIT_ENABLED === 'true';
  if (env.GUESSIT_SCRIPT) next.guessers.guessitScript = env.GUESSIT_SCRIPT;
  if (env.PYTHON) next.guessers.pythonCommand = env.PYTHON;
  if (env.HOST) next.host = env.HOST;
  const port = Number(env.PORT || 0);
  if (Number.isInteger(port) && port > 0) next.port = port;
  if (isLogLevel(env.LOG_LEVEL)) next.logLevel = env.LOG_LEVEL;
  return next;
}

export function loadConfig(file = configPath(), env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (!fs.existsSync(file)) return applyEnv(normalizeConfig({}), env);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`could not read ${file}: ${describeError(e)}`, file);
  }
  return applyEnv(normalizeConfig(raw), env);
}

export function saveConfig(cfg: AppConfig, file = configPath()) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const normalized = normalizeConfig(cfg);
  fs.writeFileSync(file, JSON.stringify(normalized, null, 2));
  return normalized;
}

async function requireDir(p: string, what: string) {
  if (!p) throw new ConfigError(`no ${what} configured`);
  if (!path.isAbsolute(p)) throw new ConfigError(`${what} must be an absolute path: ${p}`, p);
  let st: fs.Stats;
  try {
    st = await fs.promises.stat(p);
  } catch (e) {
    throw new ConfigError(`${what} not found: ${p}`, p);
  }
  if (!st.isDirectory()) throw new ConfigError(`${what} is not a directory: ${p}`, p);
}

/** Fail fast before any scan or move touches the disk. */
export async function validateRoots(sourceRoots: readonly string[], destinationRoot: string) {
  if (!sourceRoots.length) throw new ConfigError('no source folders configured');
  for (const root of sourceRoots) await requireDir(root, 'source folder');
  await requireDir(destinationRoot, 'destination folder');
}
