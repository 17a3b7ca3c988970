import type { Response } from "express";
import { z } from "zod";
import { ServiceError } from "../services/errors";

/** Answer a failed request the same way on every route. */
export function sendRouteError(res: Response, error: unknown, tag: string, fallbackMessage: string) {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ message: "Invalid request data", errors: error.errors });
  }
  if (error instanceof ServiceError) {
    return res.status(error.status).json({ message: error.message });
  }

  console.error(`[${tag}] ${fallbackMessage}:`, error);
  return res.status(500).json({ message: fallbackMessage });
}
