import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ExpiryEngine } from '../engine';
import type { SweepRegistry } from '../engine/sweepRegistry';
import { badRequest, sendFailure } from './errors';

const startSchema = z.object({
  ns: z.string().min(1, 'ns required'),
  set: z.string().min(1, 'set required'),
  bins: z.array(z.string().min(1)).optional(),
  timeout_ms: z.number().int().nonnegative().optional(),
});

const jobSchema = z.object({
  job_id: z.string().min(1, 'job_id required'),
});

export async function registerCleanRoutes(app: FastifyInstance, engine: ExpiryEngine, registry: SweepRegistry) {
  // Start a background sweep; poll GET /bins.clean for completion
  app.post('/bins.clean', async (req, reply) => {
    const parsed = startSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { ns, set, bins, timeout_ms } = parsed.data;
    try {
      const job = registry.add(engine.clean({ namespace: ns, set }, { bins, timeoutMs: timeout_ms }));
      req.log.info({ job: job.id, ns, set }, 'Sweep scheduled');
      return reply.code(202).send({ job_id: job.id });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.get('/bins.clean', async (req, reply) => {
    const parsed = jobSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const job = registry.get(parsed.data.job_id);
    if (!job) return reply.code(404).send({ status: 'FAILED', error: 'not_found' });
    return reply.send(job.snapshot());
  });

  app.delete('/bins.clean', async (req, reply) => {
    const parsed = jobSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const job = registry.get(parsed.data.job_id);
    if (!job) return reply.code(404).send({ status: 'FAILED', error: 'not_found' });
    job.cancel();
    const report = await job.done;
    return reply.send(report);
  });
}
