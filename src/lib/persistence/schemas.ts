/**
 * Zod schemas for stored documents and request bodies.
 * Unknown scale/model fields are stripped; history entries keep every field.
 */

import { z } from "zod";

export const ScaleSchema = z.object({
  id: z.number().int().safe(),
  name: z.string(),
  category: z.string().default(""),
  enabled: z.boolean().default(true),
  instructions: z.string().default(""),
});

/** Body of POST /api/prompts/scales/add. An integer id makes it an upsert. */
export const ScaleAddSchema = z.object({
  id: z.number().int().safe().optional(),
  name: z.string().min(1, "name is required"),
  category: z.string().default(""),
  enabled: z.boolean().default(true),
  instructions: z.string().default(""),
});

export const ScalePatchSchema = z
  .object({
    name: z.string().min(1),
    category: z.string(),
    enabled: z.boolean(),
    instructions: z.string(),
  })
  .partial();

export const ModelSchema = z.object({
  id: z.string().min(1, "id is required"),
  name: z.string().default(""),
  provider: z.string().default(""),
});

export const ModelPatchSchema = z
  .object({
    name: z.string(),
    provider: z.string(),
  })
  .partial();

export const HistoryPayloadSchema = z.record(z.string(), z.unknown());

export const HistoryEntrySchema = z.object({ id: z.number().int().safe() }).catchall(z.unknown());

/** Returns the first issue as "path: message", or the message alone. */
export function firstIssueMessage(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
