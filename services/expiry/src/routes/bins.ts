import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ExpiryEngine } from '../engine';
import type { BinPut, RecordKey } from '../types';
import { fromWire, recordToWire, wireFieldValueSchema } from '../values';
import { badRequest, sendFailure } from './errors';

// ---------- Schemas ----------
const keySchema = z.object({
  ns: z.string().min(1, 'ns required'),
  set: z.string().min(1, 'set required'),
  key: z.string().min(1, 'key required'),
});

const getSchema = keySchema.extend({
  // comma separated bin names
  bins: z
    .string()
    .min(1, 'bins required')
    .transform((raw) => raw.split(',').map((bin) => bin.trim()).filter((bin) => bin.length > 0)),
});

const putSchema = keySchema.extend({
  bin: z.string().min(1, 'bin required'),
  value: wireFieldValueSchema,
  ttl_s: z.number().int(),
});

const putsSchema = keySchema.extend({
  bins: z
    .array(
      z.object({
        bin: z.string().min(1, 'bin required'),
        value: wireFieldValueSchema.optional(),
        ttl_s: z.number().int().optional(),
      }),
    )
    .min(1),
});

const touchSchema = keySchema.extend({
  bins: z
    .array(
      z.object({
        bin: z.string().min(1, 'bin required'),
        ttl_s: z.number().int({ message: 'ttl_s must be an integer' }),
      }),
    )
    .min(1),
});

const ttlSchema = keySchema.extend({
  bin: z.string().min(1, 'bin required'),
});

function recordKey(input: z.infer<typeof keySchema>): RecordKey {
  return { namespace: input.ns, set: input.set, key: input.key };
}

// ---------- Routes ----------
export async function registerBinRoutes(app: FastifyInstance, engine: ExpiryEngine) {
  app.get('/bins.get', async (req, reply) => {
    const parsed = getSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const fields = await engine.get(recordKey(parsed.data), parsed.data.bins);
      return reply.send({ bins: recordToWire(fields) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.post('/bins.put', async (req, reply) => {
    const parsed = putSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { bin, value, ttl_s } = parsed.data;
    try {
      await engine.put(recordKey(parsed.data), bin, fromWire(value), ttl_s);
      return reply.send({ status: 'OK' });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.post('/bins.puts', async (req, reply) => {
    const parsed = putsSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const entries: BinPut[] = parsed.data.bins.map(({ bin, value, ttl_s }) => ({
      bin,
      ...(value !== undefined ? { value: fromWire(value) } : {}),
      ...(ttl_s !== undefined ? { ttl: ttl_s } : {}),
    }));
    try {
      await engine.puts(recordKey(parsed.data), entries);
      return reply.send({ status: 'OK' });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.post('/bins.touch', async (req, reply) => {
    const parsed = touchSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const entries = parsed.data.bins.map(({ bin, ttl_s }) => ({ bin, ttl: ttl_s }));
    try {
      await engine.touch(recordKey(parsed.data), entries);
      return reply.send({ status: 'OK' });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.get('/bins.ttl', async (req, reply) => {
    const parsed = ttlSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const result = await engine.ttl(recordKey(parsed.data), parsed.data.bin);
      // -1 never expires, null absent or expired
      const ttl = result.state === 'expiring' ? result.seconds : result.state === 'never' ? -1 : null;
      return reply.send({ ttl });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });
}
