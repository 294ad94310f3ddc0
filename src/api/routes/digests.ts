import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { config } from '../../config.js';
import type { DigestStore } from '../../storage/index.js';
import { isIsoDate, todayDateString } from '../../utils/date.js';

const listQuerySchema = z.object({
  date: z.string().refine(isIsoDate, { message: 'date must be YYYY-MM-DD' }).optional(),
});

const digestParamsSchema = z.object({
  teamId: z.coerce.number().int().positive(),
  gamePk: z.coerce.number().int().positive(),
});

export const digestsRoutes: FastifyPluginAsync<{ store: DigestStore }> = async (app, opts) => {
  const { store } = opts;

  // GET /digests?date=YYYY-MM-DD (defaults to today)
  app.get('/', async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: query.error.issues[0]?.message ?? 'Invalid query' });
    }

    const date = query.data.date ?? todayDateString(config.BASEBALL_TZ);
    const data = await store.listDigests(date);
    return { date, data, count: data.length };
  });

  // GET /digests/:teamId/:gamePk
  app.get('/:teamId/:gamePk', async (request, reply) => {
    const params = digestParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: 'teamId and gamePk must be positive integers' });
    }

    const record = await store.getDigest(params.data.teamId, params.data.gamePk);
    if (!record) return reply.code(404).send({ error: 'Digest not found' });
    return record;
  });

  // GET /digests/:teamId/:gamePk/markdown
  app.get('/:teamId/:gamePk/markdown', async (request, reply) => {
    const params = digestParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: 'teamId and gamePk must be positive integers' });
    }

    const record = await store.getDigest(params.data.teamId, params.data.gamePk);
    if (!record) return reply.code(404).send({ error: 'Digest not found' });
    return reply.type('text/markdown; charset=utf-8').send(record.renderedText);
  });
};
