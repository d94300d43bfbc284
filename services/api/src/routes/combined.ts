import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CombinedHandler } from '../combined/handler';
import { toTodoPayload } from '../catalog/todos';
import { UpstreamError } from '../errors';

// ---------- Schemas ----------
const paramsSchema = z.object({
  // decimal digits only, within the safe integer range
  id: z
    .string()
    .regex(/^[1-9]\d*$/, 'id must be a positive decimal integer')
    .transform(Number)
    .pipe(z.number().int().positive().safe()),
});

// /api/asyncdemo is the legacy controller prefix
const COMBINED_PATHS = ['/combined/:id', '/api/asyncdemo/combined/:id'];

// ---------- Routes ----------
export async function registerCombinedRoutes(app: FastifyInstance, handler: CombinedHandler) {
  for (const path of COMBINED_PATHS) {
    app.get(path, async (req, reply) => {
      const parsed = paramsSchema.safeParse(req.params);
      if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

      const { id } = parsed.data;

      try {
        const result = await handler.handle(id);
        return reply.send({
          product: result.product,
          todo: toTodoPayload(result.remoteItem),
          message: result.message,
        });
      } catch (err) {
        if (!(err instanceof UpstreamError)) throw err;
        req.log.error({ err, id, source: err.source }, 'Combined lookup failed');
        return reply.code(502).send({ error: 'upstream_failed', message: 'Upstream dependency failed' });
      }
    });
  }
}
