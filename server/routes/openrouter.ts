/**
 * POST /api/test-openrouter - checks an OpenRouter key with one tiny completion.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import {
  DEFAULT_TEST_MODEL,
  runOpenRouterTest,
  type OpenRouterOptions,
} from "../../src/lib/openrouter/testCall.js";
import { parseBody, sendError } from "./http.js";

const TestBodySchema = z.object({
  apiKey: z.string().min(1, "apiKey is required"),
  model: z.string().min(1).default(DEFAULT_TEST_MODEL),
});

export function testOpenRouterPost(options: OpenRouterOptions) {
  return async (req: Request, res: Response) => {
    const body = parseBody(req, res, TestBodySchema);
    if (!body) return;
    try {
      const { status, body: payload } = await runOpenRouterTest(body.apiKey, body.model, options);
      res.status(status).json(payload);
    } catch (e) {
      sendError(res, 500, e instanceof Error ? e.message : "Internal server error");
    }
  };
}
