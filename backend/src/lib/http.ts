/**
 * Error envelopes and request helpers shared by every route
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";

export type ErrorStatus = 400 | 404 | 405 | 422 | 500;

export const DEFAULT_MESSAGES: Record<ErrorStatus, string> = {
  400: "The request could not be understood by the server",
  404: "The requested resource could not be found",
  405: "The method is not allowed for the requested URL",
  422: "The json that was sent did not include a proper field. Please refer to documentation.",
  500: "The server encountered an internal error",
};

export interface ErrorEnvelope {
  success: false;
  status: number;
  message: string;
}

export function errorEnvelope(status: number, message: string): ErrorEnvelope {
  return { success: false, status, message };
}

export function httpError(status: ErrorStatus, message?: string): HTTPException {
  return new HTTPException(status, { message: message ?? DEFAULT_MESSAGES[status] });
}

/**
 * Parses the JSON body; malformed JSON is a 400
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch (error) {
    throw new HTTPException(400, {
      message: "Request body must be valid JSON",
      cause: error,
    });
  }
}

export function methodNotAllowed(c: Context) {
  return c.json(errorEnvelope(405, DEFAULT_MESSAGES[405]), 405);
}

export function handleNotFound(c: Context) {
  return c.json(errorEnvelope(404, DEFAULT_MESSAGES[404]), 404);
}

/**
 * app.onError handler: HTTPExceptions keep their status, anything else is a 500
 */
export function handleError(err: Error, c: Context) {
  if (err instanceof HTTPException) {
    return c.json(errorEnvelope(err.status, err.message), err.status);
  }

  console.error("Unhandled error:", err);
  return c.json(errorEnvelope(500, DEFAULT_MESSAGES[500]), 500);
}
