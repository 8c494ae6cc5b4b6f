import type { FastifyInstance } from 'fastify';
import type { TickCompletedEvent } from '@statusboard/core';

import type { AppContext } from '../types';

const formatEvent = (event: string, payload: unknown) =>
  `event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`;

export const registerEventRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/events', async (request, reply) => {
    reply.raw.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    reply.raw.setHeader('Cache-Control', 'no-cache, no-transform');
    reply.raw.setHeader('Connection', 'keep-alive');
    reply.raw.flushHeaders?.();
    reply.hijack();
    reply.raw.write(': connected\n\n');

    const send = (event: string, payload: unknown) => {
      try {
        reply.raw.write(formatEvent(event, payload));
      } catch (error) {
        app.log.error({ err: error, event }, 'Failed to write SSE event');
      }
    };

    const onTick = (tick: TickCompletedEvent) => {
      send('block.updated', {
        index: tick.index,
        title: tick.title,
        last_updated: tick.lastUpdated,
        failures: tick.failures
      });
    };

    const heartbeat = setInterval(() => {
      try {
        reply.raw.write(': keep-alive\n\n');
      } catch (error) {
        app.log.warn({ err: error }, 'Failed to send heartbeat, closing stream');
        request.raw.destroy();
      }
    }, 15_000);

    ctx.supervisor.on('tick:completed', onTick);

    request.raw.on('close', () => {
      clearInterval(heartbeat);
      ctx.supervisor.off('tick:completed', onTick);
    });

    return reply;
  });
};
