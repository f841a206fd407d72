import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import buildServer from '../src/server.js';
import { createFakeProvider, createTestServices } from './helpers.js';

function writeRoute(source: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'routes-'));
  writeFileSync(join(dir, 'package.json'), '{"type":"module"}\n', 'utf8');
  writeFileSync(join(dir, 'broken.js'), source, 'utf8');
  return dir;
}

describe('health route', () => {
  it('returns 503 before server start', async () => {
    const app = await buildServer({ market: () => createTestServices(createFakeProvider()) });
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ ok: false });
    await app.close();
  });

  it('reports whether the catalog is loaded once started', async () => {
    const services = createTestServices(createFakeProvider(['BTCUSDT']));
    const app = await buildServer({ market: () => services });
    app.isStarted = true;

    const before = await app.inject({ method: 'GET', url: '/api/health' });
    expect(before.statusCode).toBe(200);
    expect(before.json()).toMatchObject({ ok: true, catalogLoaded: false });
    expect(typeof before.json().ts).toBe('number');

    await services.catalog.get();
    const after = await app.inject({ method: 'GET', url: '/api/health' });
    expect(after.json()).toMatchObject({ ok: true, catalogLoaded: true });
    await app.close();
  });

  it('fails to boot when a route does not export a plugin', async () => {
    const dir = writeRoute('export const foo = 42;\nexport const bar = {};\n');
    try {
      await expect(
        buildServer({ routesDir: dir, market: () => createTestServices(createFakeProvider()) }),
      ).rejects.toThrowError(/Route broken\.js does not export a Fastify plugin\./);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails to boot when a route throws during registration', async () => {
    const dir = writeRoute("export default async function () { throw new Error('startup boom'); }\n");
    try {
      await expect(
        buildServer({ routesDir: dir, market: () => createTestServices(createFakeProvider()) }),
      ).rejects.toThrowError(/startup boom/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
