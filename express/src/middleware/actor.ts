import type { NextFunction, Request, Response } from 'express';
import { authorizeAll, type AuthorizedFieldSet } from '@querygate/core';

export type Actor = {
  isAuthenticated: boolean;
  subject?: string;
  roles: string[];
  claims: Record<string, unknown>;
};

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export const ANONYMOUS: Actor = Object.freeze({ isAuthenticated: false, roles: [], claims: {} });

export type ActorResolver = (req: Request) => Promise<Actor> | Actor;

/** Which fields of an entity the actor may filter and sort on. */
export type FieldAccessResolver = (actor: Actor, entity: string) => AuthorizedFieldSet;

export const allowAllFields: FieldAccessResolver = () => authorizeAll();

export function actorMiddleware(resolver?: ActorResolver) {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.actor = (await resolver?.(req)) ?? ANONYMOUS;
      next();
    } catch (e) {
      next(e);
    }
  };
}

export function getActor(req: Request): Actor {
  return req.actor ?? ANONYMOUS;
}
