import fs from 'fs';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildApp } from '../src/server.js';
import { normalizeConfig } from '../src/config.js';

let tmp: string;
let src: string;
let dest: string;
let app: FastifyInstance;

beforeEach(async () => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'relocator-http-'));
  src = path.join(tmp, 'src');
  dest = path.join(tmp, 'dest');
  fs.mkdirSync(path.join(src, 'Cheers'), { recursive: true });
  fs.mkdirSync(dest);
  fs.writeFileSync(path.join(src, 'Cheers', 'Cheers_04x05-Tortilla.mkv'), '0123456789');
  app = await buildApp(normalizeConfig({ sourceRoots: [src], destinationRoot: dest }), {
    configFile: path.join(tmp, 'config', 'config.json'),
  });
});

afterEach(async () => {
  await app.close();
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('HTTP driver', () => {
  it('answers health checks', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok' });
  });

  it('reports guesser availability', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/guessers' });
    expect(res.json()).toEqual([
      { name: 'release-name', enabled: true, available: true },
      { name: 'guessit', enabled: false, available: false },
    ]);
  });

  it('plans, selects and applies', async () => {
    expect((await app.inject({ method: 'POST', url: '/api/apply' })).statusCode).toBe(404);

    const plan = await app.inject({ method: 'POST', url: '/api/plan', payload: {} });
    expect(plan.statusCode).toBe(200);
    const body = plan.json();
    const destPath = path.join(dest, 'Series', 'Cheers', 'Season 04', 'Cheers - 04x05 - Tortilla.mkv');
    expect(body.items).toHaveLength(1);
    expect(body.items[0].destPath).toBe(destPath);
    expect(body.warnings).toEqual([]);
    expect(body.tree.state).toBe('checked');

    const off = await app.inject({ method: 'POST', url: '/api/selection/toggle', payload: { id: body.tree.id, state: 'unchecked' } });
    expect(off.json().state).toBe('unchecked');
    const nothing = await app.inject({ method: 'POST', url: '/api/apply' });
    expect(nothing.statusCode).toBe(400);
    expect(nothing.json()).toEqual({ error: 'Nothing selected' });

    await app.inject({ method: 'POST', url: '/api/selection/toggle', payload: { id: body.tree.id } });
    const applied = await app.inject({ method: 'POST', url: '/api/apply' });
    expect(applied.statusCode).toBe(200);
    expect(applied.json()).toEqual({ moved: 1, totalBytes: 10, errors: [] });
    expect(fs.readFileSync(destPath, 'utf8')).toBe('0123456789');
    expect(fs.existsSync(path.join(src, 'Cheers'))).toBe(false);

    const status = await app.inject({ method: 'GET', url: '/api/apply/status' });
    expect(status.json()).toEqual({ running: false, done: 10, total: 10, label: 'Cheers - 04x05 - Tortilla.mkv' });
    expect((await app.inject({ method: 'GET', url: '/api/selection' })).statusCode).toBe(404);
  });

  it('keeps cleanup inside the roots the plan was built from', async () => {
    const sub = path.join(src, 'Cheers');
    fs.writeFileSync(path.join(sub, 'notes.txt'), 'keep me');

    const plan = await app.inject({ method: 'POST', url: '/api/plan', payload: { sourceRoots: [sub] } });
    expect(plan.statusCode).toBe(200);
    expect(plan.json().items).toHaveLength(1);

    const applied = await app.inject({ method: 'POST', url: '/api/apply' });
    expect(applied.json()).toEqual({ moved: 1, totalBytes: 10, errors: [] });
    expect(fs.existsSync(sub)).toBe(true);
    expect(fs.readFileSync(path.join(sub, 'notes.txt'), 'utf8')).toBe('keep me');
  });

  it('sweeps emptied folders under a root given in the request', async () => {
    const other = path.join(tmp, 'other');
    fs.mkdirSync(path.join(other, 'Show'), { recursive: true });
    fs.writeFileSync(path.join(other, 'Show', 'Show.S01E02.mkv'), 'abcd');
    fs.writeFileSync(path.join(other, 'Show', 'info.url'), 'x');

    await app.inject({ method: 'POST', url: '/api/plan', payload: { sourceRoots: [other] } });
    const applied = await app.inject({ method: 'POST', url: '/api/apply' });
    expect(applied.json()).toEqual({ moved: 1, totalBytes: 4, errors: [] });
    expect(fs.existsSync(path.join(other, 'Show'))).toBe(false);
    expect(fs.existsSync(other)).toBe(true);
  });

  it('rejects unknown nodes and bad states', async () => {
    await app.inject({ method: 'POST', url: '/api/plan', payload: {} });
    const unknown = await app.inject({ method: 'POST', url: '/api/selection/toggle', payload: { id: 'n999' } });
    expect(unknown.statusCode).toBe(404);
    const bad = await app.inject({ method: 'POST', url: '/api/selection/toggle', payload: { id: 'n0', state: 'partial' } });
    expect(bad.statusCode).toBe(400);
  });

  it('maps configuration problems to 400', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/plan', payload: { destinationRoot: path.join(tmp, 'missing') } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: `destination folder not found: ${path.join(tmp, 'missing')}` });
  });

  it('validates and persists configuration', async () => {
    const bad = await app.inject({ method: 'PUT', url: '/api/config', payload: { chunkSize: -1 } });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toEqual({ error: 'chunkSize must be a positive integer' });

    const ok = await app.inject({ method: 'PUT', url: '/api/config', payload: { chunkSize: 2048 } });
    expect(ok.statusCode).toBe(200);
    expect(ok.json().chunkSize).toBe(2048);
    expect(ok.json().sourceRoots).toEqual([src]);
    const saved: unknown = JSON.parse(fs.readFileSync(path.join(tmp, 'config', 'config.json'), 'utf8'));
    expect(saved).toMatchObject({ chunkSize: 2048, destinationRoot: dest });
    expect((await app.inject({ method: 'GET', url: '/api/config' })).json().chunkSize).toBe(2048);
  });

  it('serves logs and validates the log level', async () => {
    const logs = await app.inject({ method: 'GET', url: '/api/logs?since=0' });
    expect(Array.isArray(logs.json())).toBe(true);
    expect((await app.inject({ method: 'GET', url: '/api/loglevel' })).json()).toEqual({ level: 'info' });
    const bad = await app.inject({ method: 'POST', url: '/api/loglevel', payload: { level: 'verbose' } });
    expect(bad.statusCode).toBe(400);
  });
});
