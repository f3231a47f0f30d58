import Fastify from 'fastify';
import { ZodError } from 'zod';
import { aggregate, tableToParsed } from '../core/aggregate.js';
import { InputPreconditionError, TableParseError } from '../core/errors.js';
import { Logger, silentLogger } from '../core/logger.js';
import { AggregateRequestSchema, MergeRequestSchema, ParseRequestSchema } from '../core/schema.js';
import { RawObservation, Zone } from '../core/types.js';
import { ZoneRegistry } from '../core/zones.js';
import { parseCategoryTable, serializeTable } from '../lua/table.js';
import { emptyDocument, readDocument, renderDocument, tableNameFor } from '../merge/document.js';
import { mergeDocument } from '../merge/merge.js';

export type ServerOptions = {
  log?: Logger;
  registry?: ZoneRegistry;
};

/**
 * Zone lookup for one request: registered zones come from the registry, and an
 * unknown canonical id gets a single Zone shared by all its observations.
 */
export function zoneResolver(registry: ZoneRegistry): (zoneId: string, zoneName?: string) => Zone {
  const adhoc = new Map<string, Zone>();
  return (zoneId, zoneName) => {
    const known = registry.byCanonical(zoneId) ?? adhoc.get(zoneId);
    if (known) return known;
    const zone = new Zone(zoneId, zoneId, zoneName ?? '');
    adhoc.set(zoneId, zone);
    return zone;
  };
}

export function buildServer({ log = silentLogger(), registry = new ZoneRegistry() }: ServerOptions = {}) {
  const app = Fastify();

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'invalid request', details: error.issues });
    }
    if (error instanceof InputPreconditionError || error instanceof TableParseError) {
      return reply.code(422).send({ error: error.message, code: error.code });
    }
    log.error({ reason: error.message }, 'request failed');
    return reply.code(500).send({ error: 'internal error' });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.post('/aggregate', async (request, reply) => {
    const body = AggregateRequestSchema.parse(request.body);
    const zoneFor = zoneResolver(registry);
    const observations: RawObservation[] = body.observations.map((item) => ({
      zone: zoneFor(item.zoneId, item.zoneName),
      x: item.x,
      y: item.y,
      sourceId: item.sourceId
    }));
    const parsed = tableToParsed(aggregate(body.category, observations));
    return reply.send({ table: serializeTable(tableNameFor(body.prefix, body.category), parsed), parsed });
  });

  app.post('/parse', async (request, reply) => {
    const body = ParseRequestSchema.parse(request.body);
    return reply.send(parseCategoryTable(body.text, tableNameFor(body.prefix, body.category)));
  });

  app.post('/merge', async (request, reply) => {
    const body = MergeRequestSchema.parse(request.body);
    const existing = body.document.trim() === '' ? emptyDocument(body.prefix) : readDocument(body.document, { prefix: body.prefix, log });
    const merged = mergeDocument(existing, body.tables);
    return reply.send({ document: renderDocument(merged, body.prefix) });
  });

  return app;
}
