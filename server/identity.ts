import type { Request, Response, NextFunction } from "express";
import type { Actor } from "@shared/models";
import { ServiceError } from "./services/errors";

// Authentication happens upstream; the acting user arrives in headers
declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export const USER_ID_HEADER = 'x-user-id';
export const USER_ROLE_HEADER = 'x-user-role';

export function readActor(req: Request): Actor | undefined {
  const id = req.get(USER_ID_HEADER)?.trim();
  if (!id) return undefined;
  return { id, isAdmin: req.get(USER_ROLE_HEADER)?.trim().toLowerCase() === 'admin' };
}

export const requireActor = (req: Request, res: Response, next: NextFunction) => {
  const actor = readActor(req);
  if (!actor) {
    console.log("[AUTH] Request rejected - No user id provided:", { path: req.path, method: req.method });
    return res.status(401).json({ message: "Not authenticated" });
  }

  req.actor = actor;
  next();
};

/** The actor attached by requireActor. */
export function actorOf(req: Request): Actor {
  if (!req.actor) throw ServiceError.unauthenticated();
  return req.actor;
}
