import express from 'express';
import type { Request, Response } from 'express';
import {
  ADAPTER_IDS,
  RequestParseError,
  isPlainObject,
  parsePaging,
  parseSort,
  type AdapterId,
  type Logger,
  type ParsePagingOptions,
  type QueryEngine,
} from '@querygate/core';

import { toHttpFailure } from '../http/errors.js';
import { getActor, type FieldAccessResolver } from '../middleware/actor.js';
import { buildPagination, complexityMeta } from '../middleware/responseEnvelope.js';

export type SearchRouterDeps = {
  engine: QueryEngine;
  resolveFields: FieldAccessResolver;
  paging?: ParsePagingOptions;
  logger?: Logger;
};

function parseAdapter(v: unknown): AdapterId | undefined {
  if (v === undefined || v === null || v === '') return undefined;
  const found = ADAPTER_IDS.find((id) => id === v);
  if (!found) throw new RequestParseError('adapter', `Unknown adapter: ${String(v)}`, String(v));
  return found;
}

/** Aborts when the client goes away before the response is written. */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort(new Error('Client closed the request'));
  });
  return controller.signal;
}

export function createSearchRouter(deps: SearchRouterDeps) {
  const router = express.Router();
  const { engine } = deps;
  const logger = deps.logger ?? engine.logger;

  function fail(res: Response, e: unknown) {
    const failure = toHttpFailure(e);
    if (failure.code >= 500) {
      logger.error('[http] search failed', { error: e instanceof Error ? e.message : String(e) });
    }
    return res.fail(failure);
  }

  router.post('/:entity/search', async (req: Request, res: Response) => {
    try {
      const name = String(req.params.entity || '');
      const def = engine.entity(name);
      const body: unknown = req.body ?? {};
      if (!isPlainObject(body)) throw new RequestParseError('body', 'Request body must be a JSON object');

      const sort = parseSort(body.sort, def.fields);
      const paging = parsePaging(body, deps.paging);
      const adapter = parseAdapter(body.adapter);

      const result = await engine.search(name, {
        filter: body.filter,
        authorized: deps.resolveFields(getActor(req), name),
        sort,
        ...(paging.limit !== undefined ? { limit: paging.limit } : {}),
        offset: paging.offset,
        ...(adapter ? { adapter } : {}),
        signal: requestSignal(res),
      });
      if (!result.ok) return fail(res, result.error);

      const { rows, total, plan } = result.value;
      return res.ok(rows, {
        code: 200,
        pagination: buildPagination(paging.limit, total, paging.page),
        complexity: complexityMeta(plan.decision),
      });
    } catch (e) {
      return fail(res, e);
    }
  });

  router.get('/:entity/capabilities', async (req: Request, res: Response) => {
    try {
      const name = String(req.params.entity || '');
      const adapter = parseAdapter(req.query.adapter);
      return res.ok(await engine.capabilities(name, adapter ? { adapter } : {}), { code: 200, pagination: null });
    } catch (e) {
      return fail(res, e);
    }
  });

  return router;
}
