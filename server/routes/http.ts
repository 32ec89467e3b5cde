/**
 * Shared route plumbing: store leases per request, param parsing, error envelopes.
 */

import type { Request, RequestHandler, Response } from "express";
import type { z } from "zod";
import { withStore } from "../../src/lib/persistence/provider.js";
import { firstIssueMessage } from "../../src/lib/persistence/schemas.js";
import { isIntegerId } from "../../src/lib/persistence/identity.js";
import type { ResourceStore, StoreProvider } from "../../src/lib/persistence/types.js";

export type StoreHandler = (store: ResourceStore, req: Request, res: Response) => Promise<unknown>;

/** Route param as a string. Wildcard params arrive as segments and are joined with "/". */
export function paramId(req: Request, name: string): string {
  const raw: unknown = req.params[name];
  if (Array.isArray(raw)) return raw.map(String).join("/");
  return typeof raw === "string" ? raw : "";
}

/** Integer route param, or null when the segment is not a plain integer. */
export function paramInt(req: Request, name: string): number | null {
  const raw = paramId(req, name);
  if (!/^-?\d+$/.test(raw)) return null;
  const n = Number(raw);
  return isIntegerId(n) ? n : null;
}

export function sendError(res: Response, status: number, message: string) {
  res.status(status).json({ success: false, error: message });
}

/** Parses req.body with schema; on failure answers 400 and returns null. */
export function parseBody<TSchema extends z.ZodTypeAny>(
  req: Request,
  res: Response,
  schema: TSchema
): z.output<TSchema> | null {
  const parsed = schema.safeParse(req.body);
  if (!parsed.success) {
    sendError(res, 400, firstIssueMessage(parsed.error));
    return null;
  }
  return parsed.data;
}

/** Runs handler with a store lease; the lease is released on every exit path. */
export function withStoreHandler(provider: StoreProvider, handler: StoreHandler): RequestHandler {
  return async (req, res) => {
    try {
      await withStore(provider, (store) => handler(store, req, res));
    } catch (e) {
      console.error(`[api] ${req.method} ${req.originalUrl} failed:`, e);
      if (!res.headersSent) sendError(res, 500, e instanceof Error ? e.message : "Internal server error");
    }
  };
}
