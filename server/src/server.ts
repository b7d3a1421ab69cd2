// server/src/server.ts
import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';

import { compileSamplePattern, configPath, normalizeConfig, normalizeForHost, saveConfig, type AppConfig } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { getLogLevel, getLogs, isLogLevel, log, setLogLevel } from './logging.js';
import { Classifier } from './parse.js';
import { ReleaseNameGuesser } from './releaseGuess.js';
import { GuessitGuesser } from './guessit.js';
import { buildPlan } from './scan.js';
import { SelectionTree } from './selection.js';
import { runBatch } from './batch.js';
import type { TitleGuesser } from './types.js';

export interface AppOptions {
  /** Where PUT /api/config persists; defaults to CONFIG_PATH */
  configFile?: string;
}

interface Guessers {
  primary?: TitleGuesser;
  fallback: GuessitGuesser;
}

interface ApplyStatus {
  running: boolean;
  done: number;
  total: number;
  label: string;
}

function makeGuessers(cfg: AppConfig): Guessers {
  return {
    primary: cfg.guessers.releaseName ? new ReleaseNameGuesser() : undefined,
    fallback: new GuessitGuesser({
      enabled: cfg.guessers.guessit,
      scriptPath: cfg.guessers.guessitScript,
      pythonCommand: cfg.guessers.pythonCommand,
    }),
  };
}

function asRecord(v: unknown): Record<string, unknown> {
  if (!v || typeof v !== 'object' || Array.isArray(v)) return {};
  return Object.fromEntries(Object.entries(v));
}

function fail(reply: FastifyReply, e: unknown, what: string) {
  if (e instanceof ConfigError) {
    log('warn', `${what}: ${e.message}`);
    return reply.status(400).send({ error: e.message });
  }
  log('error', `${what}: ${describeError(e)}`);
  return reply.status(500).send({ error: what });
}

export async function buildApp(initial: AppConfig, opts: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  const configFile = opts.configFile ?? configPath();

  let config = initial;
  let guessers = makeGuessers(config);
  let tree: SelectionTree | null = null;
  // Roots the current plan was built from; cleanup stays inside these
  let planRoots: string[] = [];
  let busy: 'plan' | 'apply' | null = null;
  let status: ApplyStatus = { running: false, done: 0, total: 0, label: '' };

  // Optional CORS
  if (process.env.ENABLE_CORS === '1') {
    await app.register(cors, { origin: true });
    log('info', 'CORS enabled');
  }

  app.addHook('onClose', async () => {
    guessers.fallback.close();
  });

  // Health endpoint for readiness checks
  app.get('/health', async () => {
    return { status: 'ok', uptime: process.uptime(), now: Date.now() };
  });

  app.get('/api/config', async () => config);

  app.put('/api/config', async (req, reply) => {
    if (busy) return reply.status(409).send({ error: `busy: ${busy} in progress` });
    try {
      const next = saveConfig(normalizeConfig(req.body, config), configFile);
      guessers.fallback.close();
      config = next;
      guessers = makeGuessers(config);
      log('info', `Config saved: ${config.sourceRoots.length} source folder(s) -> ${config.destinationRoot || '(unset)'}`);
      return config;
    } catch (e) {
      return fail(reply, e, 'Failed to save config');
    }
  });

  app.get('/api/guessers', async () => {
    const primary = guessers.primary;
    return [
      { name: 'release-name', enabled: config.guessers.releaseName, available: primary ? primary.isAvailable() : false },
      { name: guessers.fallback.name, enabled: config.guessers.guessit, available: guessers.fallback.isAvailable() },
    ];
  });

  app.post('/api/plan', async (req, reply) => {
    if (busy) return reply.status(409).send({ error: `busy: ${busy} in progress` });
    busy = 'plan';
    try {
      const body = asRecord(req.body);
      const roots = body.sourceRoots;
      const dest = body.destinationRoot;
      const sourceRoots = Array.isArray(roots)
        ? roots.filter((s): s is string => typeof s === 'string').map(s => normalizeForHost(s))
        : config.sourceRoots;
      const destinationRoot = typeof dest === 'string' ? normalizeForHost(dest) : config.destinationRoot;

      const classifier = new Classifier({ primaryGuesser: guessers.primary, fallbackGuesser: guessers.fallback });
      const result = await buildPlan(sourceRoots, destinationRoot, {
        classifier,
        videoExtensions: config.videoExtensions,
        samplePattern: compileSamplePattern(config.samplePattern),
        hiddenMarker: config.hiddenMarker,
        defaultExtension: config.defaultExtension,
      });
      tree = SelectionTree.build(result.items);
      planRoots = [...sourceRoots];
      return { items: result.items, warnings: result.warnings, tree: tree.toJSON() };
    } catch (e) {
      return fail(reply, e, 'Plan failed');
    } finally {
      busy = null;
    }
  });

  app.get('/api/selection', async (_req, reply) => {
    if (!tree) return reply.status(404).send({ error: 'No plan' });
    return tree.toJSON();
  });

  app.post('/api/selection/toggle', async (req, reply) => {
    if (!tree) return reply.status(404).send({ error: 'No plan' });
    const body = asRecord(req.body);
    const rawId = body.id;
    const id = typeof rawId === 'string' ? rawId : '';
    const raw = body.state;
    let state: 'checked' | 'unchecked' | undefined;
    if (raw === 'checked' || raw === 'unchecked') state = raw;
    else if (raw !== undefined) return reply.status(400).send({ error: 'state must be checked or unchecked' });
    const node = tree.find(id);
    if (!node) return reply.status(404).send({ error: `Unknown node: ${id}` });
    tree.toggle(node, state);
    return tree.toJSON();
  });

  app.post('/api/apply', async (_req, reply) => {
    if (busy) return reply.status(409).send({ error: `busy: ${busy} in progress` });
    if (!tree) return reply.status(404).send({ error: 'No plan' });
    const items = tree.selectedLeaves();
    if (!items.length) return reply.status(400).send({ error: 'Nothing selected' });

    busy = 'apply';
    status = { running: true, done: 0, total: 0, label: '' };
    try {
      const result = await runBatch(items, { ...config, sourceRoots: planRoots }, (p) => {
        status = { running: true, done: p.done, total: p.total, label: p.label };
      });
      tree = null;
      planRoots = [];
      return result;
    } catch (e) {
      return fail(reply, e, 'Apply failed');
    } finally {
      status = { ...status, running: false };
      busy = null;
    }
  });

  app.get('/api/apply/status', async () => status);

  app.get<{ Querystring: { since?: string } }>('/api/logs', async (req) => {
    const since = Number(req.query.since || 0);
    return getLogs(Number.isFinite(since) ? since : 0);
  });

  // Get/set runtime log level
  app.get('/api/loglevel', async () => ({ level: getLogLevel() }));
  app.post('/api/loglevel', async (req, reply) => {
    const lvl = String(asRecord(req.body).level || '').toLowerCase();
    if (!isLogLevel(lvl)) return reply.status(400).send({ error: 'invalid level' });
    setLogLevel(lvl);
    log('info', `Log level set to ${lvl}`);
    return { ok: true, level: lvl };
  });

  return app;
}
