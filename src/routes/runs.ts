// ---------------------------------------------------------------------------
// /runs: on-demand trigger and run history
//
//   POST /runs       start a cleanup run in the background
//   GET  /runs       most recent runs
//   GET  /runs/:id   one run with its deletion audit
// ---------------------------------------------------------------------------

import { FastifyInstance, FastifyReply } from 'fastify';
import { RunInProgressError } from '../errors';
import { formatError, parseLimit } from '../formatter';
import type { RunStore } from '../run-store';
import type { CleanupRunner } from '../runner';

export interface RunsRoutesOptions {
  runner: CleanupRunner;
  store: RunStore;
}

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

export async function runsRoutes(
  server: FastifyInstance,
  { runner, store }: RunsRoutesOptions,
): Promise<void> {
  server.addHook('onRequest', server.authenticate);

  server.post('/', async (_request, reply: FastifyReply) => {
    try {
      const { runId, completion } = await runner.start('manual');
      // The run outlives the request; completion never rejects.
      void completion;
      return reply.status(202).send({ runId });
    } catch (err) {
      if (err instanceof RunInProgressError) {
        return reply.status(409).send(formatError(409, err.message));
      }
      server.log.error({ err }, 'POST /runs failed');
      return reply.status(500).send(formatError(500, 'Internal server error'));
    }
  });

  server.get<{ Querystring: { limit?: string } }>('/', async (request, reply: FastifyReply) => {
    const limit = parseLimit(request.query.limit, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);

    try {
      const runs = await store.listRuns(limit);
      return reply.status(200).send({ runs });
    } catch (err) {
      server.log.error({ err }, 'GET /runs failed');
      return reply.status(500).send(formatError(500, 'Internal server error'));
    }
  });

  server.get<{ Params: { id: string } }>('/:id', async (request, reply: FastifyReply) => {
    const id = Number(request.params.id);
    if (!Number.isInteger(id) || id < 1) {
      return reply.status(400).send(formatError(400, `Invalid run id '${request.params.id}'.`));
    }

    try {
      const run = await store.getRun(id);
      if (!run) {
        return reply.status(404).send(formatError(404, `Run ${id} not found.`));
      }
      return reply.status(200).send(run);
    } catch (err) {
      server.log.error({ err, id }, 'GET /runs/:id failed');
      return reply.status(500).send(formatError(500, 'Internal server error'));
    }
  });
}
