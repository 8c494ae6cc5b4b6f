import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { encodeSnapshot } from '@statusboard/core';

import type { AppContext } from '../types';
import { mapErrorToResponse } from '../errors';
import { buildPage } from '../page';

const dataQuerySchema = z.object({
  pretty: z.enum(['true', 'false']).optional()
});

export const registerPageRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/', async (request, reply) => {
    try {
      const html = await buildPage(ctx.config, ctx.store.snapshot(), request.log);
      reply.header('Content-Type', 'text/html; charset=utf-8');
      return html;
    } catch (error) {
      request.log.error({ err: error }, 'Error generating page');
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }
  });

  app.get('/data', async (request, reply) => {
    const parseResult = dataQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      const mapped = mapErrorToResponse(parseResult.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    const snapshot = ctx.store.snapshot();
    reply.header('Content-Type', 'application/json; charset=utf-8');
    if (parseResult.data.pretty === 'true') {
      return `${JSON.stringify(snapshot, null, 2)}\n`;
    }
    return encodeSnapshot(snapshot);
  });
};
