import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { buildServer, zoneResolver } from '../src/api/server.js';
import { ZoneRegistry } from '../src/core/zones.js';

describe('api', () => {
  let app: ReturnType<typeof buildServer>;

  beforeAll(async () => {
    app = buildServer({ registry: await ZoneRegistry.fromFile() });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('answers health checks', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('aggregates observations into a table', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/aggregate',
      payload: {
        category: 'herbs',
        observations: [
          { zoneId: '2248', x: 10, y: 20, sourceId: '401' },
          { zoneId: '2248', x: 10, y: 20, sourceId: '402' }
        ]
      }
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      table: 'GatherMate2HerbDB = {\n\t[2248] = {\n\t\t[1000200000] = 401,\n\t\t[1000200001] = 402,\n\t},\n}',
      parsed: { '2248': { '1000200000': '401', '1000200001': '402' } }
    });
  });

  it('uses the requested table prefix', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/aggregate',
      payload: { category: 'ores', prefix: 'Test', observations: [{ zoneId: '5', zoneName: 'Test Zone', x: 0, y: 0, sourceId: '1' }] }
    });
    expect(response.json()).toMatchObject({ table: 'TestMineDB = {\n\t[5] = {\n\t\t[0] = 1,\n\t},\n}' });
  });

  it('rejects out-of-range coordinates with 422', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/aggregate',
      payload: { category: 'herbs', observations: [{ zoneId: '2248', x: 101, y: 20, sourceId: '401' }] }
    });
    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({ error: 'x=101 out of range for source 401 in zone 2248', code: 'INPUT_PRECONDITION' });
  });

  it('rejects malformed bodies with 400', async () => {
    const response = await app.inject({ method: 'POST', url: '/aggregate', payload: { category: 'gems', observations: [] } });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'invalid request' });
  });

  it('parses one table out of a document', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/parse',
      payload: { category: 'fish', text: 'GatherMate2DB = {\n}\nGatherMate2FishDB = { [1] = { [2] = 3 } }\n' }
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ '1': { '2': '3' } });
  });

  it('rejects a broken table with 422', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/parse',
      payload: { category: 'fish', text: 'GatherMate2FishDB = { [1] = "x" }' }
    });
    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({ error: 'GatherMate2FishDB[1] is not a table (line 1)', code: 'TABLE_PARSE' });
  });

  it('merges tables into a document', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/merge',
      payload: {
        document: 'GatherMate2DB = {\n}\nGatherMate2HerbDB = {\n\t[1] = {\n\t\t[100] = 5,\n\t},\n}\n',
        tables: { herbs: { '1': { '200': '6' } } }
      }
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      document: 'GatherMate2DB = {\n}\nGatherMate2HerbDB = {\n\t[1] = {\n\t\t[100] = 5,\n\t\t[200] = 6,\n\t},\n}\n'
    });
  });

  it('rejects tables with non-decimal keys with 400', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/merge',
      payload: { tables: { herbs: { abc: { 'x y': 'foo}' } } } }
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'invalid request' });
  });

  it('starts from an empty document', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/merge',
      payload: { tables: { fish: { '1': { '100': '7' } } } }
    });
    expect(response.json()).toEqual({
      document: 'GatherMate2DB = {\n}\nGatherMate2FishDB = {\n\t[1] = {\n\t\t[100] = 7,\n\t},\n}\n'
    });
  });
});

describe('zoneResolver', () => {
  it('shares one zone per unknown canonical id', () => {
    const zoneFor = zoneResolver(new ZoneRegistry());
    const first = zoneFor('5', 'Test Zone');
    expect(zoneFor('5')).toBe(first);
    expect(first.displayName).toBe('Test Zone');
    expect(zoneFor('6')).not.toBe(first);
  });

  it('prefers registered zones', () => {
    const registry = new ZoneRegistry();
    const mulgore = registry.define('100', '7', 'Mulgore');
    expect(zoneResolver(registry)('7', 'Other name')).toBe(mulgore);
  });
});
