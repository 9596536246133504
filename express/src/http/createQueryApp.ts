import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { ParsePagingOptions, QueryEngine } from '@querygate/core';

import {
  actorMiddleware,
  allowAllFields,
  type Actor,
  type ActorResolver,
  type FieldAccessResolver,
} from '../middleware/actor.js';
import { responseEnvelope } from '../middleware/responseEnvelope.js';
import { createSearchRouter } from '../routers/search.js';
import { toHttpFailure } from './errors.js';

export type QueryAppOptions = {
  engine: QueryEngine;
  basePath?: string;
  resolveActor?: ActorResolver;
  defaultActor?: Actor;
  /** Defaults to every field of every entity. */
  resolveFields?: FieldAccessResolver;
  paging?: ParsePagingOptions;
};

export function createQueryApp(opts: QueryAppOptions) {
  const app = express();
  const basePath = opts.basePath ?? '';
  const defaultActor = opts.defaultActor;

  app.use(responseEnvelope);
  app.use(express.json({ limit: '1mb' }));
  app.use(actorMiddleware(opts.resolveActor ?? (defaultActor ? () => defaultActor : undefined)));

  app.get(`${basePath}/health`, (_req, res) =>
    res.ok({ ok: true, app: opts.engine.config.app.name }, { code: 200, pagination: null }),
  );
  app.use(
    `${basePath}/api`,
    createSearchRouter({
      engine: opts.engine,
      resolveFields: opts.resolveFields ?? allowAllFields,
      ...(opts.paging ? { paging: opts.paging } : {}),
    }),
  );

  app.use((e: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(e);
    return res.fail(toHttpFailure(e));
  });

  return app;
}
