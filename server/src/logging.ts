import pino from 'pino';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LEVELS: readonly string[] = ['info', 'warn', 'error', 'debug'];

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && LEVELS.includes(v);
}

const envLevel = process.env.LOG_LEVEL || 'info';
const logger = pino({ level: envLevel === 'silent' || isLogLevel(envLevel) ? envLevel : 'info' });

type Entry = { level: LogLevel; msg: string; time: number };
const ring: Entry[] = [];
const RING_MAX = 2000;

let runtimeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel) {
  runtimeLevel = level;
  logger.level = level;
}

export function getLogLevel() { return runtimeLevel; }

export function log(level: LogLevel, msg: string) {
  // The ring keeps every entry so /api/logs can show debug lines even when
  // the console threshold is higher.
  ring.push({ level, msg, time: Date.now() });
  if (ring.length > RING_MAX) ring.splice(0, ring.length - RING_MAX);
  logger[level](msg);
}

export function getLogs(since?: number) {
  return ring.filter(e => !since || e.time > since);
}

export function installProcessHandlers() {
  process.on('uncaughtException', (err) => {
    log('error', `uncaughtException: ${err.stack || String(err)}`);
  });
  process.on('unhandledRejection', (r) => {
    log('error', `unhandledRejection: ${r instanceof Error ? (r.stack || r.message) : String(r)}`);
  });
}
